import { StringDecoder } from 'node:string_decoder';
import type { DataSource } from '../../domain/ports/DataSource.js';

/**
 * Split a source's chunks into lines without materialising the whole input.
 * Line terminators (`\n` or `\r\n`) are stripped. A final line without a
 * terminator is still yielded; a trailing terminator does not produce an empty line.
 */
export async function* readLines(source: DataSource): AsyncGenerator<string> {
  const decoder = new StringDecoder('utf-8');
  let pending = '';

  for await (const chunk of source.read()) {
    pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.end();
  if (pending !== '') {
    yield stripCarriageReturn(pending);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
