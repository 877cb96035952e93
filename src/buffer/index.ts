export { computeTextSummary, createDocument, utf8ByteLength } from "./document.ts";
export { deleteRange, insertText } from "./edits.ts";
export { advance, constrain, fromOffset, locate, toOffset } from "./translate.ts";
export * from "./types.ts";
