/**
 * Error taxonomy for the scheduling core
 */

export type ScheduleErrorCode =
  | 'INVALID_INPUT'
  | 'INSUFFICIENT_DATA'
  | 'NOT_FOUND'
  | 'STORE_FAILURE';

export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode;

  constructor(code: ScheduleErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScheduleError';
    this.code = code;
  }
}

/** Rejected before any I/O: empty IDs, out-of-range day of week */
export class InvalidInputError extends ScheduleError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

/** No activity history in the lookback window. Expected for new streamers. */
export class InsufficientDataError extends ScheduleError {
  readonly streamerId: string;

  constructor(streamerId: string) {
    super('INSUFFICIENT_DATA', `insufficient activity history for streamer ${streamerId}`);
    this.name = 'InsufficientDataError';
    this.streamerId = streamerId;
  }
}

export class NotFoundError extends ScheduleError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/** Wraps whatever the underlying repository threw, including cancellation */
export class StoreFailureError extends ScheduleError {
  constructor(message: string, options?: ErrorOptions) {
    super('STORE_FAILURE', message, options);
    this.name = 'StoreFailureError';
  }
}

export function isScheduleError(error: unknown): error is ScheduleError {
  return error instanceof ScheduleError;
}

export function requireId(value: string, label: string): void {
  if (value === '') {
    throw new InvalidInputError(`${label} cannot be empty`);
  }
}
