import type { PaymentError } from '../types';

/**
 * Base error for the SDK. Carries the same fields as `PaymentError`
 * so it can be handed to `onError` callbacks as is.
 */
export class ComponentError extends Error implements PaymentError {
  readonly code: string;
  readonly field?: string;
  readonly cause?: unknown;

  constructor(code: string, message: string, options: { field?: string; cause?: unknown } = {}) {
    super(message);
    this.name = 'ComponentError';
    this.code = code;
    this.field = options.field;
    this.cause = options.cause;
  }

  toPaymentError(): PaymentError {
    return {
      code: this.code,
      message: this.message,
      field: this.field,
      cause: this.cause
    };
  }
}

/** An index path that does not point at a committed row. */
export class IndexOutOfRangeError extends ComponentError {
  constructor(message: string) {
    super('INDEX_OUT_OF_RANGE', message);
    this.name = 'IndexOutOfRangeError';
  }
}

export class InvalidConfigurationError extends ComponentError {
  constructor(field: string, message: string) {
    super('INVALID_CONFIGURATION', message, { field });
    this.name = 'InvalidConfigurationError';
  }
}

/** Two items with the same id were given to a single reload. */
export class DuplicateItemError extends ComponentError {
  readonly itemId: string;

  constructor(itemId: string) {
    super('DUPLICATE_ITEM', `Duplicate item id: ${itemId}`);
    this.name = 'DuplicateItemError';
    this.itemId = itemId;
  }
}

export class DuplicateSectionError extends ComponentError {
  readonly sectionId: string;

  constructor(sectionId: string) {
    super('DUPLICATE_SECTION', `Duplicate section id: ${sectionId}`);
    this.name = 'DuplicateSectionError';
    this.sectionId = sectionId;
  }
}

export class RequestError extends ComponentError {
  readonly status: number;

  constructor(message: string, status: number, cause?: unknown) {
    super('REQUEST_FAILED', message, { cause });
    this.name = 'RequestError';
    this.status = status;
  }
}

/**
 * Converts anything thrown into a `PaymentError` for UI callbacks.
 */
export function toPaymentError(error: unknown, fallbackCode: string, fallbackMessage: string): PaymentError {
  if (error instanceof ComponentError) {
    return error.toPaymentError();
  }
  return {
    code: fallbackCode,
    message: error instanceof Error && error.message ? error.message : fallbackMessage,
    cause: error
  };
}
