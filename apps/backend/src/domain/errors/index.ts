// =============================================================================
// Domain Errors - Re-export from shared-types
// =============================================================================

export {
  AppError,
  NotFoundError,
  ValidationError,
  ConflictError,
  ApprovalAlreadyResolvedError,
  ApprovalTimeoutError,
  LLMError,
  ToolError,
  PersistenceError,
  ExecutionError,
} from '@taskweave/shared-types';
