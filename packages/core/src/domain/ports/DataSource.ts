/** Metadata about the data source (for logging and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading a dump from any origin (file, buffer, stream).
 *
 * Chunks carry no line boundaries; `readLines()` reassembles them.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
