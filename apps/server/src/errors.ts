import type { FieldIssue } from '@taskapi/core';

/** An error that maps directly onto an HTTP response */
export class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }

  toBody(): { detail: unknown } {
    return { detail: this.message };
  }
}

export class ValidationError extends HttpError {
  constructor(readonly issues: readonly FieldIssue[]) {
    super(422, 'Validation failed');
    this.name = 'ValidationError';
  }

  override toBody(): { detail: readonly FieldIssue[] } {
    return { detail: this.issues };
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not Found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class TaskNotFoundError extends NotFoundError {
  constructor(readonly taskId: number) {
    super('Task not found');
    this.name = 'TaskNotFoundError';
  }
}
