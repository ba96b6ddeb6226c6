// =============================================================================
// Base Application Error
// =============================================================================

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    // V8 specific - available in Node.js
    if ('captureStackTrace' in Error && typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// =============================================================================
// Not Found Error (404)
// =============================================================================

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      `${resource.toUpperCase()}_NOT_FOUND`,
      id ? `${resource} with id ${id} not found` : `${resource} not found`,
      404
    );
    this.name = 'NotFoundError';
  }
}

// =============================================================================
// Validation Error (400)
// =============================================================================

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, 400, details);
    this.name = 'ValidationError';
  }
}

// =============================================================================
// Conflict Error (409)
// =============================================================================

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFLICT', message, 409, details);
    this.name = 'ConflictError';
  }
}

// =============================================================================
// Approval Already Resolved (409)
// =============================================================================

export class ApprovalAlreadyResolvedError extends ConflictError {
  constructor(requestId: string, state: 'approved' | 'rejected' | 'expired') {
    super(`Approval request ${requestId} is already ${state}`, { requestId, state });
    this.name = 'ApprovalAlreadyResolvedError';
  }
}

// =============================================================================
// Approval Timeout (408)
// =============================================================================

export class ApprovalTimeoutError extends AppError {
  constructor(toolName: string, timeoutMs: number) {
    super(
      'APPROVAL_TIMEOUT',
      `Approval request for ${toolName} timed out after ${timeoutMs}ms`,
      408,
      { toolName, timeoutMs }
    );
    this.name = 'ApprovalTimeoutError';
  }
}

// =============================================================================
// LLM Error (502)
// =============================================================================

export class LLMError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super('LLM_ERROR', `${provider}: ${message}`, 502, details);
    this.name = 'LLMError';
  }
}

// =============================================================================
// Tool Error (500)
// =============================================================================

export class ToolError extends AppError {
  constructor(toolId: string, message: string) {
    super('TOOL_ERROR', `Tool ${toolId}: ${message}`, 500, { toolId });
    this.name = 'ToolError';
  }
}

// =============================================================================
// Persistence Error (500)
// =============================================================================

export class PersistenceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PERSISTENCE_ERROR', message, 500, details);
    this.name = 'PersistenceError';
  }
}


// =============================================================================
// Execution Error (500)
// =============================================================================

export class ExecutionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('EXECUTION_ERROR', message, 500, details);
    this.name = 'ExecutionError';
  }
}
