// Standardized error handling utilities
// Shared by the knowledge loaders and the HTTP routes

export enum ErrorCode {
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  KNOWLEDGE_BASE_INVALID = 'knowledge_base_invalid',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  // Raised while loading a bundled table; never on a clinical request
  static knowledgeBaseInvalid(table: string, details?: unknown): AppError {
    return new AppError(
      ErrorCode.KNOWLEDGE_BASE_INVALID,
      `Knowledge table "${table}" failed validation`,
      500,
      details
    );
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}
