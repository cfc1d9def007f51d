import { Readable } from 'node:stream';
import { blob } from 'node:stream/consumers';
import type { AttachmentSource, MultipartRequestBody } from './body.js';

async function toBlob(source: AttachmentSource, type: string): Promise<Blob> {
  if (source instanceof Blob) return new Blob([source], { type });
  if (source instanceof Readable) {
    const data = await blob(source);
    return new Blob([data], { type });
  }
  // Copy into a plain ArrayBuffer so it is accepted as a BlobPart.
  const ab = new ArrayBuffer(source.byteLength);
  new Uint8Array(ab).set(source);
  return new Blob([ab], { type });
}

/**
 * Materialize a multipart body as a `FormData` for `fetch`. Each attachment
 * source is consumed here, in part order; streams are drained to the end.
 */
export async function toFormData(body: MultipartRequestBody<unknown>): Promise<FormData> {
  const form = new FormData();
  for (const part of body.parts) {
    if (part.kind === 'file') {
      form.append(part.name, await toBlob(part.data, part.contentType), part.filename);
    } else {
      form.append(part.name, part.value);
    }
  }
  return form;
}
