export type ServiceErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'GENERATION_FAILURE'
  | 'STORAGE_FAILURE';

export abstract class ServiceError extends Error {
  abstract readonly code: ServiceErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends ServiceError {
  readonly code = 'INVALID_ARGUMENT';
}

export class NotFoundError extends ServiceError {
  readonly code = 'NOT_FOUND';
}

/**
 * The text-generation call failed (network, quota, auth or an unusable response).
 */
export class GenerationFailureError extends ServiceError {
  readonly code = 'GENERATION_FAILURE';
}

export class StorageFailureError extends ServiceError {
  readonly code = 'STORAGE_FAILURE';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
