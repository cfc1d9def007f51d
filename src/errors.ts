/** Raised synchronously by builder mutators when an argument violates a limit or is absent. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** A non-2xx response, reported through a pending request's failure path. */
export class ErrorResponseError extends Error {
  public readonly status: number;
  public readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(`Discord API error: ${status}${describeBody(body)}`);
    this.name = 'ErrorResponseError';
    this.status = status;
    this.body = body;
  }
}

function describeBody(body: unknown): string {
  if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
    return ` (${body.message})`;
  }
  return '';
}
