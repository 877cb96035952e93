/**
 * File services: the storage boundary behind Session.openOrFocus and
 * Session.saveCurrent.
 *
 * MemoryFileService keeps files in a Map (tests, scratch sessions, embedders
 * with their own persistence). NodeFileService reads and writes a directory
 * on disk, synchronously, with the same size and name policy.
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { dirname, resolve } from "node:path";
import { utf8ByteLength } from "../buffer/document.ts";
import { FileServiceError } from "../errors.ts";
import { type EngineLogger, silentLogger } from "../logger.ts";
import type { FileService } from "./types.ts";

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/**
 * Reject names no backend can store: empty, or containing a NUL byte.
 */
export function validateFileName(name: string): void {
  if (name.length === 0) {
    throw new FileServiceError("InvalidName", name, "File name cannot be empty");
  }
  if (name.includes("\0")) {
    throw new FileServiceError("InvalidName", name, "File name cannot contain null bytes");
  }
}

function checkSize(name: string, text: string, maxFileSize: number): void {
  const bytes = utf8ByteLength(text);
  if (bytes > maxFileSize) {
    throw new FileServiceError(
      "TooLarge",
      name,
      `${name} is ${bytes} bytes, over the ${maxFileSize} byte limit`,
    );
  }
}

// =============================================================================
// In-memory
// =============================================================================

export interface MemoryFileServiceOptions {
  /** Initial contents, by name. */
  files?: Record<string, string>;
  /** Names that can be opened but not saved. */
  readOnly?: Iterable<string>;
  maxFileSize?: number;
}

export class MemoryFileService implements FileService {
  private readonly _files = new Map<string, string>();
  private readonly _readOnly: Set<string>;
  private readonly _maxFileSize: number;

  constructor(options: MemoryFileServiceOptions = {}) {
    for (const [name, text] of Object.entries(options.files ?? {})) {
      this._files.set(name, text);
    }
    this._readOnly = new Set(options.readOnly);
    this._maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  }

  open(name: string): string {
    validateFileName(name);
    const text = this._files.get(name);
    if (text === undefined) {
      throw new FileServiceError("NotFound", name, `File not found: ${name}`);
    }
    checkSize(name, text, this._maxFileSize);
    return text;
  }

  save(name: string, text: string): void {
    validateFileName(name);
    checkSize(name, text, this._maxFileSize);
    if (this._readOnly.has(name)) {
      throw new FileServiceError("PermissionDenied", name, `Cannot write to file: ${name}`);
    }
    this._files.set(name, text);
  }

  has(name: string): boolean {
    return this._files.has(name);
  }

  /** Stored text, for assertions and inspection. */
  read(name: string): string | undefined {
    return this._files.get(name);
  }
}

// =============================================================================
// Disk
// =============================================================================

export interface NodeFileServiceOptions {
  /** Directory relative names resolve against. Defaults to process.cwd(). */
  root?: string;
  maxFileSize?: number;
  /** Copy an existing file to `<file>.backup` before overwriting it. */
  autoBackup?: boolean;
  logger?: EngineLogger;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

function toFileServiceError(
  error: unknown,
  name: string,
  verb: "read" | "write",
): FileServiceError {
  const code = errorCode(error);
  if (code === "ENOENT") {
    return new FileServiceError("NotFound", name, `File not found: ${name}`, error);
  }
  if (code === "EACCES" || code === "EPERM" || code === "EISDIR" || code === "EROFS") {
    return new FileServiceError("PermissionDenied", name, `Cannot ${verb} file: ${name}`, error);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new FileServiceError("Failed", name, `Failed to ${verb} ${name}: ${detail}`, error);
}

export class NodeFileService implements FileService {
  readonly root: string;
  private readonly _maxFileSize: number;
  private readonly _autoBackup: boolean;
  private readonly _log: EngineLogger;

  constructor(options: NodeFileServiceOptions = {}) {
    this.root = resolve(options.root ?? process.cwd());
    this._maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this._autoBackup = options.autoBackup ?? false;
    this._log = options.logger ?? silentLogger;
  }

  /** Absolute path for a name; absolute names pass through. */
  resolvePath(name: string): string {
    return resolve(this.root, name);
  }

  open(name: string): string {
    validateFileName(name);
    const path = this.resolvePath(name);

    const stats = statSync(path, { throwIfNoEntry: false });
    if (stats === undefined) {
      throw new FileServiceError("NotFound", name, `File not found: ${name}`);
    }
    if (!stats.isFile()) {
      throw new FileServiceError("PermissionDenied", name, `Cannot read file: ${name}`);
    }
    if (stats.size > this._maxFileSize) {
      throw new FileServiceError(
        "TooLarge",
        name,
        `${name} is ${stats.size} bytes, over the ${this._maxFileSize} byte limit`,
      );
    }

    try {
      return readFileSync(path, "utf8");
    } catch (error) {
      throw toFileServiceError(error, name, "read");
    }
  }

  save(name: string, text: string): void {
    validateFileName(name);
    checkSize(name, text, this._maxFileSize);
    const path = this.resolvePath(name);

    try {
      if (this._autoBackup && existsSync(path)) {
        const backupPath = `${path}.backup`;
        copyFileSync(path, backupPath);
        this._log("backup created", { name, backupPath });
      }
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, text, "utf8");
    } catch (error) {
      throw toFileServiceError(error, name, "write");
    }
  }
}
