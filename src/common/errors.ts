export type RouterErrorCode =
  | 'UNPARSEABLE_WINDOW'
  | 'WINDOW_OUT_OF_RANGE'
  | 'CLASSIFICATION_INVALID'
  | 'COLLABORATOR_FAILURE'
  | 'VALIDATION_ERROR';

export abstract class RouterError extends Error {
  abstract readonly code: RouterErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnparseableWindowError extends RouterError {
  readonly code: RouterErrorCode = 'UNPARSEABLE_WINDOW';

  constructor(readonly phrase: string, message?: string) {
    super(
      message ??
        `I couldn't understand the time window '${phrase}'. Try 'yesterday', 'last week', or a specific date like 'July 14'.`,
    );
  }
}

/**
 * The phrase parsed, but the whole window falls before the lookback cap.
 */
export class WindowOutOfRangeError extends UnparseableWindowError {
  readonly code: RouterErrorCode = 'WINDOW_OUT_OF_RANGE';

  constructor(phrase: string, readonly maxLookbackDays: number) {
    super(phrase, `I can only access items from the last ${maxLookbackDays} days.`);
  }
}

export class ClassificationInvalidError extends RouterError {
  readonly code: RouterErrorCode = 'CLASSIFICATION_INVALID';

  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CollaboratorFailureError extends RouterError {
  readonly code: RouterErrorCode = 'COLLABORATOR_FAILURE';

  constructor(readonly operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
  }
}

export class ValidationError extends RouterError {
  readonly code: RouterErrorCode = 'VALIDATION_ERROR';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
