export type { ActionLogOptions, EditAction, GroupMode } from "./action-log.ts";
export { ActionLog, applyAction, invertAction } from "./action-log.ts";
export { HistoryStack } from "./history-stack.ts";
export type { Timestamped, TimestampedHistoryOptions } from "./timestamped.ts";
export { TimestampedHistory } from "./timestamped.ts";
