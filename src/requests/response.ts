import { isRecord } from '../checks.js';
import { InvalidArgumentError } from '../errors.js';

/** A response as handed over by the execution engine, body already parsed. */
export type RestResponse = {
  status: number;
  body: unknown;
};

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export function getResponseObject(response: RestResponse): Record<string, unknown> {
  if (!isRecord(response.body)) {
    throw new InvalidArgumentError(`Expected a JSON object in the ${response.status} response body`);
  }
  return response.body;
}
