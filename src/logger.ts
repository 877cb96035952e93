/**
 * Logging hook. The engine never writes to stdout/stderr itself (the terminal
 * belongs to the display surface), so embedders pass a sink.
 */

export type EngineLogger = (message: string, details?: Record<string, unknown>) => void;

export const silentLogger: EngineLogger = () => {};
