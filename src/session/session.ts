/**
 * Session: an ordered set of open documents with one of them focused.
 *
 * Documents and their metadata live in two index-aligned arrays. A session
 * is never empty: closing the last document replaces it with a fresh
 * untitled one.
 *
 * Session is itself a TextStorage. Reads and mutations go to the focused
 * document, and every successful mutation marks it dirty.
 */

import { createDocument } from "../buffer/document.ts";
import {
  asDocumentId,
  type Document,
  type DocumentId,
  type Line,
  type Offset,
  type TextStorage,
} from "../buffer/types.ts";
import { type EngineConfig, resolveConfig } from "../config.ts";
import { InvalidOperationError, OutOfBoundsError } from "../errors.ts";
import { type EngineLogger, silentLogger } from "../logger.ts";
import { NodeFileService } from "./file-service.ts";
import { bufferListing, bufferStatusLine } from "./status.ts";
import type { DocumentEntry, DocumentMetadata, FileService } from "./types.ts";

export interface SessionOptions {
  /**
   * Where documents are opened from and saved to. Defaults to a
   * NodeFileService rooted at the working directory, configured from
   * `maxFileSize` and `autoBackup`.
   */
  fileService?: FileService;
  /** Partial EngineConfig; validated with resolveConfig. */
  config?: unknown;
  logger?: EngineLogger;
}

export class Session implements TextStorage {
  readonly config: EngineConfig;
  readonly fileService: FileService;
  private readonly _log: EngineLogger;
  private _documents: Document[] = [];
  private _metadata: DocumentMetadata[] = [];
  private _current = 0;
  private _nextDocumentId = 1;
  private _nextUntitled = 1;

  constructor(options: SessionOptions = {}) {
    this.config = resolveConfig(options.config ?? {});
    this._log = options.logger ?? silentLogger;
    this.fileService =
      options.fileService ??
      new NodeFileService({
        maxFileSize: this.config.maxFileSize,
        autoBackup: this.config.autoBackup,
        logger: this._log,
      });
    this._pushUntitled();
  }

  /**
   * A session holding `names`, opened in order, with the first one focused.
   * An empty list gives a session with one untitled document. The first
   * failing open throws and no session is created.
   */
  static fromFiles(names: readonly string[], options: SessionOptions = {}): Session {
    const session = new Session(options);
    if (names.length === 0) return session;

    const texts = names.map((name) => session.fileService.open(name));
    session._documents = [];
    session._metadata = [];
    session._nextDocumentId = 1;
    session._nextUntitled = 1;
    names.forEach((name, index) => {
      session._push(name, texts[index] ?? "");
    });
    session._current = 0;
    session._log("session opened", { documents: names.length });
    return session;
  }

  // ===========================================================================
  // Document management
  // ===========================================================================

  get documentCount(): number {
    return this._documents.length;
  }

  get currentIndex(): number {
    return this._current;
  }

  get currentDocument(): Document {
    const doc = this._documents[this._current];
    if (doc === undefined) {
      throw new InvalidOperationError("Session has no documents");
    }
    return doc;
  }

  /** A copy of the focused document's metadata. */
  get currentMetadata(): DocumentMetadata {
    return { ...this._currentMeta() };
  }

  metadataAt(index: number): DocumentMetadata | undefined {
    const meta = this._metadata[index];
    return meta === undefined ? undefined : { ...meta };
  }

  documentAt(index: number): Document | undefined {
    return this._documents[index];
  }

  findByName(name: string): number | undefined {
    const index = this._metadata.findIndex((meta) => meta.name === name);
    return index === -1 ? undefined : index;
  }

  list(): DocumentEntry[] {
    return this._metadata.map((meta, index) => ({
      index,
      id: meta.id,
      name: meta.name,
      dirty: meta.dirty,
      current: index === this._current,
    }));
  }

  hasUnsavedChanges(): boolean {
    return this._metadata.some((meta) => meta.dirty);
  }

  /**
   * Focus the document called `name`, opening it through the file service
   * if it is not already open. Returns its index.
   */
  openOrFocus(name: string): number {
    const existing = this.findByName(name);
    if (existing !== undefined) {
      this.switchTo(existing);
      return existing;
    }

    const text = this.fileService.open(name);
    const index = this._push(name, text);
    this._current = index;
    this._log("document opened", { name, index, length: text.length });
    return index;
  }

  /** Append an empty untitled document and focus it. Returns its index. */
  newEmpty(): number {
    const index = this._pushUntitled();
    this._current = index;
    this._log("document created", { name: this._metadata[index]?.name, index });
    return index;
  }

  switchTo(index: number): void {
    this._checkIndex(index);
    if (index !== this._current) {
      this._current = index;
      this._log("focus changed", { index });
    }
  }

  close(index: number): void {
    this._checkIndex(index);
    const name = this._metadata[index]?.name;

    if (this._documents.length === 1) {
      this._documents = [];
      this._metadata = [];
      this._pushUntitled();
      this._current = 0;
      this._log("document closed", { name, index, replaced: true });
      return;
    }

    this._documents.splice(index, 1);
    this._metadata.splice(index, 1);
    if (this._current >= index && this._current > 0) {
      this._current -= 1;
    } else if (this._current >= this._documents.length) {
      this._current = this._documents.length - 1;
    }
    this._log("document closed", { name, index });
  }

  /** Focus the next document, wrapping around. Returns the new index. */
  next(): number {
    const count = this._requireDocuments();
    this.switchTo((this._current + 1) % count);
    return this._current;
  }

  /** Focus the previous document, wrapping around. Returns the new index. */
  previous(): number {
    const count = this._requireDocuments();
    this.switchTo((this._current + count - 1) % count);
    return this._current;
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  /** Write the focused document under its name. Clears dirty only on success. */
  saveCurrent(): void {
    this._save(this._currentMeta().name);
  }

  /** Write the focused document under `name`, and rename it on success. */
  saveCurrentAs(name: string): void {
    this._save(name);
    this._currentMeta().name = name;
  }

  /**
   * Swap the focused document's text for `text` wholesale, as undo and redo
   * restores do. Marks it dirty.
   */
  replaceContent(text: string): void {
    this._ensureWritable("replace content");
    const doc = this.currentDocument;
    doc.clear();
    doc.append(text);
    this._markDirty();
  }

  // ===========================================================================
  // TextStorage (focused document)
  // ===========================================================================

  get lineCount(): number {
    return this.currentDocument.lineCount;
  }

  get length(): number {
    return this.currentDocument.length;
  }

  text(): string {
    return this.currentDocument.text();
  }

  lineLength(line: Line): number {
    return this.currentDocument.lineLength(line);
  }

  getLine(line: Line): string | undefined {
    return this.currentDocument.getLine(line);
  }

  isEmpty(): boolean {
    return this.currentDocument.isEmpty();
  }

  insert(at: Offset, char: string): void {
    this._ensureWritable("insert");
    this.currentDocument.insert(at, char);
    this._markDirty();
  }

  delete(at: Offset): void {
    this._ensureWritable("delete");
    this.currentDocument.delete(at);
    this._markDirty();
  }

  append(text: string): void {
    this._ensureWritable("append");
    if (text.length === 0) return;
    this.currentDocument.append(text);
    this._markDirty();
  }

  clear(): void {
    this._ensureWritable("clear");
    this.currentDocument.clear();
    this._markDirty();
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  bufferStatusLine(): string {
    return bufferStatusLine(this._metadata, this._current);
  }

  bufferListing(): string {
    return bufferListing(this._metadata, this._current);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private _push(name: string, text: string): number {
    const id: DocumentId = asDocumentId(`doc-${this._nextDocumentId++}`);
    this._documents.push(createDocument(id, text));
    this._metadata.push({ id, name, dirty: false });
    return this._documents.length - 1;
  }

  private _pushUntitled(): number {
    return this._push(`${this.config.untitledPrefix}${this._nextUntitled++}`, "");
  }

  private _currentMeta(): DocumentMetadata {
    const meta = this._metadata[this._current];
    if (meta === undefined) {
      throw new InvalidOperationError("Session has no documents");
    }
    return meta;
  }

  private _markDirty(): void {
    this._currentMeta().dirty = true;
  }

  private _save(name: string): void {
    this._ensureWritable("save");
    const text = this.currentDocument.text();
    try {
      this.fileService.save(name, text);
    } catch (error) {
      this._log("save failed", {
        name,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    this._currentMeta().dirty = false;
    this._log("document saved", { name, length: text.length });
  }

  private _checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._documents.length) {
      throw new OutOfBoundsError("Document index", index, this._documents.length);
    }
  }

  private _requireDocuments(): number {
    const count = this._documents.length;
    if (count === 0) {
      throw new InvalidOperationError("Session has no documents");
    }
    return count;
  }

  private _ensureWritable(operation: string): void {
    if (this.config.readonly) {
      throw new InvalidOperationError(`Cannot ${operation}: session is read-only`);
    }
  }
}
