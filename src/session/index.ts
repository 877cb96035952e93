export type { MemoryFileServiceOptions, NodeFileServiceOptions } from "./file-service.ts";
export {
  DEFAULT_MAX_FILE_SIZE,
  MemoryFileService,
  NodeFileService,
  validateFileName,
} from "./file-service.ts";
export type { SessionOptions } from "./session.ts";
export { Session } from "./session.ts";
export { bufferListing, bufferStatusLine, formatPosition } from "./status.ts";
export type { DocumentEntry, DocumentMetadata, FileService } from "./types.ts";
