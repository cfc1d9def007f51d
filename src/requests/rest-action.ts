import { fallbackLogger, type LoggerLike } from '../logging.js';
import type { RequestBody } from './body.js';
import { PendingRequest } from './pending-request.js';
import type { RestResponse } from './response.js';
import { redactRoute, type CompiledRoute } from './route.js';

/**
 * The execution engine. Implementations perform the HTTP call for a pending
 * request, calling `request.action.finalizeData()` exactly once to get the
 * body, then `request.handleResponse()` (or `onFailure` on transport errors).
 */
export interface Requester {
  execute<T>(request: PendingRequest<T>): void;
}

/** Base for deferred requests: configured first, serialized only when dispatched. */
export abstract class RestAction<T> {
  protected readonly log: LoggerLike;

  constructor(
    protected readonly requester: Requester,
    readonly route: CompiledRoute,
    log?: LoggerLike,
  ) {
    this.log = log ?? fallbackLogger();
  }

  /** Produce the wire body. Called by the execution engine when the request is sent. */
  abstract finalizeData(): RequestBody | null;

  abstract handleSuccess(response: RestResponse, request: PendingRequest<T>): void;

  queue(success?: (value: T) => void, failure?: (err: Error) => void): void {
    const route = redactRoute(this.route);
    this.requester.execute(
      new PendingRequest<T>(
        this,
        success ?? (() => {}),
        failure ?? ((err) => this.log.error({ err, route }, 'rest:request failed')),
      ),
    );
  }

  submit(): Promise<T> {
    return new Promise<T>((resolve, reject) => this.queue(resolve, reject));
  }
}
