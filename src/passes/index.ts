export * from './pass.js';
export * from './pipeline.js';
export { DesignTimeDirectivePass, DESIGN_TIME_VARIABLE, createDesignTimeHelperDeclaration } from './design_time_directive_pass.js';
export { DirectiveTokenValidationPass } from './directive_token_validation_pass.js';
