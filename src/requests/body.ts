import type { Readable } from 'node:stream';

export const MEDIA_TYPE_JSON = 'application/json';
export const MEDIA_TYPE_MULTIPART = 'multipart/form-data';
export const MEDIA_TYPE_OCTET = 'application/octet-stream';

/**
 * Binary data for an attachment. Streams are read once, by whoever turns the
 * body into bytes; nothing in this package reads them.
 */
export type AttachmentSource = Buffer | Uint8Array | Blob | Readable;

export type FilePart = {
  kind: 'file';
  name: `file${number}`;
  filename: string;
  contentType: typeof MEDIA_TYPE_OCTET;
  data: AttachmentSource;
};

export type FieldPart = {
  kind: 'field';
  name: string;
  value: string;
};

export type MultipartPart = FilePart | FieldPart;

export type JsonRequestBody<P> = {
  type: 'json';
  contentType: typeof MEDIA_TYPE_JSON;
  payload: P;
};

export type MultipartRequestBody<P> = {
  type: 'multipart';
  contentType: typeof MEDIA_TYPE_MULTIPART;
  /** The same object that `payload_json` carries as text. */
  payload: P;
  parts: MultipartPart[];
};

export type RequestBody<P = unknown> = JsonRequestBody<P> | MultipartRequestBody<P>;
