export type { CutResult } from "./clipboard.ts";
export { Clipboard } from "./clipboard.ts";
export type { EditorOptions } from "./editor.ts";
export { Editor } from "./editor.ts";
export type {
  Direction,
  DisplaySize,
  DisplaySurface,
  EditorCommand,
  SelectionRange,
} from "./types.ts";
export { InputCode } from "./types.ts";
