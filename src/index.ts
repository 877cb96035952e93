export * from "./buffer/index.ts";
export type { EngineConfig } from "./config.ts";
export { DEFAULT_HISTORY_CAPACITY, EngineConfigSchema, resolveConfig } from "./config.ts";
export * from "./editor/index.ts";
export type { EngineErrorKind, FileServiceFailure } from "./errors.ts";
export {
  ConfigError,
  EngineError,
  FileServiceError,
  InvalidOperationError,
  isEngineError,
  OutOfBoundsError,
} from "./errors.ts";
export * from "./history/index.ts";
export type { EngineLogger } from "./logger.ts";
export { silentLogger } from "./logger.ts";
export * from "./session/index.ts";
