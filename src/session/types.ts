/**
 * Session-level types: per-document metadata and the file service boundary.
 */

import type { DocumentId } from "../buffer/types.ts";

/** Per-document bookkeeping, index-aligned with the session's documents. */
export interface DocumentMetadata {
  readonly id: DocumentId;
  /** File name the document was opened from and saves to. */
  name: string;
  /** True when there are mutations since the last successful save. */
  dirty: boolean;
}

/** A read-only view of one entry, as handed out by Session.list(). */
export interface DocumentEntry {
  readonly index: number;
  readonly id: DocumentId;
  readonly name: string;
  readonly dirty: boolean;
  readonly current: boolean;
}

/**
 * Persistent storage for documents. Both calls are synchronous and atomic
 * from the engine's point of view; failures throw FileServiceError and the
 * session passes them through unchanged.
 */
export interface FileService {
  /** Return the full text stored under `name`. */
  open(name: string): string;

  /** Store `text` under `name`, verbatim. */
  save(name: string, text: string): void;
}
