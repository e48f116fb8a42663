/**
 * Input Reader
 * Yields package identifiers from CLI arguments or line-delimited input
 */

import { StringDecoder } from 'string_decoder';
import type { Readable } from 'stream';

function dropCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Yields one identifier per `\n`-terminated line of a UTF-8 stream.
 * Blank lines are kept; only a `\r` right before the line end is dropped.
 * A final line without a newline is yielded unless it is empty.
 */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf8');
  let pending = '';

  for await (const chunk of input) {
    const data: unknown = chunk;
    if (typeof data === 'string') {
      pending += data;
    } else if (Buffer.isBuffer(data)) {
      pending += decoder.write(data);
    } else {
      throw new TypeError('input stream must produce strings or buffers');
    }

    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield dropCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.end();
  if (pending !== '') {
    yield dropCarriageReturn(pending);
  }
}

/**
 * Package identifiers come from the arguments when any were given,
 * otherwise from `input` one line at a time.
 */
export async function* readPackageIdentifiers(
  args: readonly string[],
  input: Readable
): AsyncGenerator<string> {
  if (args.length > 0) {
    yield* args;
    return;
  }

  yield* readLines(input);
}
