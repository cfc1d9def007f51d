import { describe, expect, it } from 'vitest';
import { Readable } from 'node:stream';
import type { MultipartRequestBody } from './body.js';
import { toFormData } from './form-data.js';

async function fileText(form: FormData, name: string): Promise<{ text: string; type: string; filename: unknown }> {
  const entry = form.get(name);
  if (!(entry instanceof Blob)) throw new Error(`${name} is not a file part`);
  return { text: await entry.text(), type: entry.type, filename: 'name' in entry ? entry.name : undefined };
}

function body(parts: MultipartRequestBody<unknown>['parts']): MultipartRequestBody<unknown> {
  return { type: 'multipart', contentType: 'multipart/form-data', payload: {}, parts };
}

describe('toFormData', () => {
  it('reads each kind of attachment source into a file part', async () => {
    const form = await toFormData(
      body([
        { kind: 'file', name: 'file0', filename: 'a.txt', contentType: 'application/octet-stream', data: Buffer.from('buffer') },
        {
          kind: 'file',
          name: 'file1',
          filename: 'b.txt',
          contentType: 'application/octet-stream',
          data: Readable.from([Buffer.from('str'), Buffer.from('eam')]),
        },
        { kind: 'file', name: 'file2', filename: 'c.txt', contentType: 'application/octet-stream', data: new Blob(['blob']) },
        {
          kind: 'file',
          name: 'file3',
          filename: 'd.txt',
          contentType: 'application/octet-stream',
          data: new TextEncoder().encode('bytes'),
        },
        { kind: 'field', name: 'payload_json', value: '{"content":"x"}' },
      ]),
    );

    expect(await fileText(form, 'file0')).toEqual({ text: 'buffer', type: 'application/octet-stream', filename: 'a.txt' });
    expect(await fileText(form, 'file1')).toEqual({ text: 'stream', type: 'application/octet-stream', filename: 'b.txt' });
    expect(await fileText(form, 'file2')).toEqual({ text: 'blob', type: 'application/octet-stream', filename: 'c.txt' });
    expect(await fileText(form, 'file3')).toEqual({ text: 'bytes', type: 'application/octet-stream', filename: 'd.txt' });
    expect(form.get('payload_json')).toBe('{"content":"x"}');
  });

  it('sends blobs under the part content type, not their own', async () => {
    const form = await toFormData(
      body([
        {
          kind: 'file',
          name: 'file0',
          filename: 'chart.png',
          contentType: 'application/octet-stream',
          data: new Blob(['png'], { type: 'image/png' }),
        },
      ]),
    );
    expect(await fileText(form, 'file0')).toEqual({ text: 'png', type: 'application/octet-stream', filename: 'chart.png' });
  });

  it('keeps part order', async () => {
    const form = await toFormData(
      body([
        { kind: 'file', name: 'file0', filename: 'a', contentType: 'application/octet-stream', data: Buffer.from('a') },
        { kind: 'file', name: 'file1', filename: 'b', contentType: 'application/octet-stream', data: Buffer.from('b') },
        { kind: 'field', name: 'payload_json', value: '{}' },
      ]),
    );
    expect([...form.keys()]).toEqual(['file0', 'file1', 'payload_json']);
  });
});
