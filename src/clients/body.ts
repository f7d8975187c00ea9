import { ResponseTooLargeError } from '../errors.js';

/**
 * Reads a response body as UTF-8 text, failing with `ResponseTooLargeError` as soon as
 * the declared or streamed size passes `limitBytes`.
 */
export async function readBodyWithLimit(response: Response, limitBytes: number): Promise<string> {
  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > limitBytes) {
    await response.body?.cancel();
    throw new ResponseTooLargeError(limitBytes);
  }

  if (!response.body) {
    return '';
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }
    received += value.byteLength;
    if (received > limitBytes) {
      await reader.cancel();
      throw new ResponseTooLargeError(limitBytes);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks).toString('utf8');
}
