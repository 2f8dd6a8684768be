export type ErrorCode = 'BAD_REQUEST' | 'VALIDATION_ERROR' | 'STRUCTURAL_ERROR' | 'INTERNAL_ERROR';

export type ErrorDetail = {
  field?: string;
  message: string;
};

export type SerializedError = {
  code: ErrorCode;
  error: string;
  details?: ErrorDetail[];
};

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      error: this.message,
      ...(this.details && { details: this.details })
    };
  }
}

export class BadRequestError extends AppError {
  constructor(message = 'Bad request', details?: ErrorDetail[]) {
    super('BAD_REQUEST', message, 400, details);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: ErrorDetail[]) {
    super('VALIDATION_ERROR', message, 400, details);
  }

  static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const details = error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    return new ValidationError('Validation failed', details);
  }
}

/**
 * Input is missing required columns. Fatal for a pipeline run: no stage after
 * the validator executes and no output tables are produced.
 */
export class StructuralError extends AppError {
  constructor(public readonly missingFields: string[]) {
    super(
      'STRUCTURAL_ERROR',
      `Missing required columns: ${missingFields.join(', ')}`,
      422,
      missingFields.map(field => ({ field, message: 'required column is missing' }))
    );
  }
}

export const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
