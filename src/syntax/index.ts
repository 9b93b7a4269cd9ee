export * from './syntax_kind.js';
export * from './span_context.js';
export * from './source_position.js';
export * from './syntax_node.js';
export * from './syntax_factory.js';
export * from './syntax_tree.js';
export * from './syntax_rewriter.js';
export * from './text_sink.js';
export * from './syntax_node_writer.js';
export * from './syntax_tree_serializer.js';
export * from './syntax_tree_verifier.js';
export {
  serializeSyntaxTreeJson,
  deserializeSyntaxTreeJson,
  isValidSyntaxTreeJson,
  type SyntaxTreeEnvelope,
  type SyntaxElementJson,
  type SyntaxTriviaJson,
  type DiagnosticJson,
} from './syntax_json.js';
