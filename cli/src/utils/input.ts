import { StringDecoder } from 'string_decoder';
import type { Readable } from 'stream';

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Lines of a text stream, without terminators
 *
 * Only `\n` and `\r\n` end a line. A lone `\r` stays part of the line, and
 * a final line without a terminator is still yielded as it is.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  for await (const chunk of input) {
    pending += Buffer.isBuffer(chunk) ? decoder.write(chunk) : String(chunk);

    let start = 0;
    let end = pending.indexOf('\n', start);
    while (end !== -1) {
      yield stripCarriageReturn(pending.slice(start, end));
      start = end + 1;
      end = pending.indexOf('\n', start);
    }
    pending = pending.slice(start);
  }

  pending += decoder.end();
  if (pending.length > 0) {
    yield pending;
  }
}
