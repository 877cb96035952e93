/**
 * Engine configuration.
 *
 * Callers pass a partial object (usually parsed from a user settings file);
 * missing keys take their schema defaults and the result is validated before
 * any component sees it.
 */

import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.ts";

export const DEFAULT_HISTORY_CAPACITY = 100;

export const EngineConfigSchema = Type.Object(
  {
    /** Entries kept on each of the undo and redo stacks. */
    historyCapacity: Type.Integer({ minimum: 1, default: DEFAULT_HISTORY_CAPACITY }),
    /** Name prefix of placeholder documents; a per-session counter follows it. */
    untitledPrefix: Type.String({ minLength: 1, default: "*untitled-" }),
    /** Spaces inserted by the tab command. */
    tabSize: Type.Integer({ minimum: 1, maximum: 16, default: 4 }),
    /** Largest file, in UTF-8 bytes, the file services will read or write. */
    maxFileSize: Type.Integer({ minimum: 0, default: 10 * 1024 * 1024 }),
    /** Copy an existing file to `<name>.backup` before overwriting it. */
    autoBackup: Type.Boolean({ default: false }),
    /** Reject every mutation and save. */
    readonly: Type.Boolean({ default: false }),
    /**
     * How the action log stores a closed group: only its last action, or the
     * whole group as one compound entry.
     */
    groupMode: Type.Union([Type.Literal("last"), Type.Literal("compound")], {
      default: "last",
    }),
  },
  { additionalProperties: false },
);

export type EngineConfig = Static<typeof EngineConfigSchema>;

/**
 * Fill defaults into `input` and validate it.
 * Throws ConfigError listing every violation.
 */
export function resolveConfig(input: unknown = {}): EngineConfig {
  const candidate = Value.Default(EngineConfigSchema, Value.Clone(input));
  if (!Value.Check(EngineConfigSchema, candidate)) {
    throw new ConfigError(Value.Errors(EngineConfigSchema, candidate));
  }
  return candidate;
}
