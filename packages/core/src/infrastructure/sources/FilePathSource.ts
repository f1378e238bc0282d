import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source that streams a UTF-8 file from a local path using `createReadStream`. */
export class FilePathSource implements DataSource {
  constructor(private readonly filePath: string) {}

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, { encoding: 'utf-8' });

    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? chunk : String(chunk);
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
    };
  }
}
