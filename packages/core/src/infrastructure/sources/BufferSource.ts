import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over an in-memory string or Buffer. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: Buffer.byteLength(this.content),
    };
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
