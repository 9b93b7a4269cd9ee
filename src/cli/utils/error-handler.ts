import {
  BaselineMismatchError,
  BaselineUsageError,
  NotImplementedError,
  SyntaxTreeJsonError,
  SyntaxTreeVerificationError,
} from '../../diagnostics/errors.js';
import { error as logError, warn as logWarn } from './logger.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function handleNodeError(error: NodeJS.ErrnoException): void {
  const code = error.code ?? 'UNKNOWN';
  switch (code) {
    case 'EACCES':
    case 'EPERM':
      logError(`文件权限不足：${error.message}`);
      break;
    case 'ENOENT':
      logError(`未找到目标文件：${error.message}`);
      break;
    default:
      logError(`文件系统错误(${code})：${error.message}`);
      break;
  }
}

export function handleError(error: unknown): never {
  if (error instanceof SyntaxTreeJsonError) {
    logError(error.message);
    for (const detail of error.errors) {
      logWarn(detail);
    }
    process.exit(1);
  }

  if (error instanceof BaselineMismatchError) {
    logError(error.message);
    logWarn('如果变更符合预期，使用 --generate（或 TREEFORM_GENERATE_BASELINES=1）重新生成基线');
    process.exit(1);
  }

  if (
    error instanceof BaselineUsageError ||
    error instanceof NotImplementedError ||
    error instanceof SyntaxTreeVerificationError
  ) {
    logError(`${error.name}: ${error.message}`);
    process.exit(1);
  }

  if (isNodeError(error)) {
    handleNodeError(error);
    process.exit(1);
  }

  if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }

  process.exit(1);
}
