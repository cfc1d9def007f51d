import { ErrorResponseError } from '../errors.js';
import type { RestAction } from './rest-action.js';
import { isSuccess, type RestResponse } from './response.js';

/**
 * One in-flight request. The execution engine owns it: it asks the action
 * for a body once, performs the call, then hands the response back through
 * `handleResponse`. Exactly one of success/failure is ever reported.
 */
export class PendingRequest<T> {
  private settled = false;

  constructor(
    readonly action: RestAction<T>,
    private readonly success: (value: T) => void,
    private readonly failure: (err: Error) => void,
  ) {}

  get route() {
    return this.action.route;
  }

  get isDone(): boolean {
    return this.settled;
  }

  onSuccess(value: T): void {
    if (this.settled) return;
    this.settled = true;
    this.success(value);
  }

  onFailure(err: unknown): void {
    if (this.settled) return;
    this.settled = true;
    this.failure(err instanceof Error ? err : new Error(String(err)));
  }

  handleResponse(response: RestResponse): void {
    if (this.settled) return;
    if (!isSuccess(response.status)) {
      this.onFailure(new ErrorResponseError(response.status, response.body));
      return;
    }
    try {
      this.action.handleSuccess(response, this);
    } catch (err) {
      // A throwing success callback is the caller's bug, not a failed request.
      if (this.settled) throw err;
      this.onFailure(err);
    }
  }
}
