export type CrmErrorReason = 'validation' | 'not_found' | 'stale_reference' | 'backing_store';

export const describeCrmError = (reason: CrmErrorReason): string => {
  switch (reason) {
    case 'validation':
      return 'Record failed validation.';
    case 'not_found':
      return 'Record does not exist in the store.';
    case 'stale_reference':
      return 'Record has already been deleted.';
    case 'backing_store':
      return 'Backing store request failed.';
    default:
      return 'Unknown record error.';
  }
};

export class CrmError extends Error {
  readonly reason: CrmErrorReason;

  constructor(reason: CrmErrorReason, message?: string, options?: { cause?: unknown }) {
    super(message ?? describeCrmError(reason), options);
    this.name = 'CrmError';
    this.reason = reason;
  }
}

export class ValidationError extends CrmError {
  constructor(message?: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends CrmError {
  readonly recordIds: readonly string[];

  constructor(message?: string, recordIds: readonly string[] = []) {
    super('not_found', message);
    this.name = 'NotFoundError';
    this.recordIds = recordIds;
  }
}

export class StaleReferenceError extends CrmError {
  readonly recordId: string | null;

  constructor(recordId: string | null, message?: string) {
    super('stale_reference', message ?? `Record ${recordId ?? '(unsaved)'} has been deleted`);
    this.name = 'StaleReferenceError';
    this.recordId = recordId;
  }
}

export class BackingStoreError extends CrmError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, cause?: unknown) {
    super('backing_store', message, { cause });
    this.name = 'BackingStoreError';
    this.status = status;
  }
}

export function isCrmError(error: unknown): error is CrmError {
  return error instanceof CrmError;
}
