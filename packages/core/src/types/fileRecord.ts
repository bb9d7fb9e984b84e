/**
 * File record types
 *
 * The file-sharing side stores one record per shared file. The extraction
 * pipeline only ever reads it.
 */

export interface FileRecord {
  /** Stable key used in callbacks and as the cache key */
  key: string;
  fileName: string;
  sizeBytes: number;
  mimeType?: string;
  /**
   * Where the content lives: an http(s) URL, a file path / file:// URL,
   * or a transport-specific reference such as `telegram:<file_id>`
   */
  storageReference: string;
}

export interface FileRecordSource {
  findByKey(key: string): Promise<FileRecord | null>;
}
