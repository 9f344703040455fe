/**
 * Session settings schema.
 *
 * Settings come from explicit input layered over OBJDB_* environment
 * variables and are validated before the session starts.
 */

import { z } from "zod";
import { DB_ALIAS } from "../constants.js";
import { InvalidSettingsError } from "../errors.js";
import { MODULE_PATH_PATTERN } from "../namespace/names.js";

export const SessionSettings = z.object({
  /** Path to the YAML config document. */
  configPath: z.string().min(1),
  /** Module path the loaded namespace is published under. */
  module: z.string().regex(MODULE_PATH_PATTERN, "must be dotted identifiers").default(DB_ALIAS),
  /** Directory the manifest is written under; omit to skip the manifest. */
  manifestRoot: z.string().min(1).optional(),
});
export type SessionSettings = z.infer<typeof SessionSettings>;
export type SessionSettingsInput = z.input<typeof SessionSettings>;

export const SETTINGS_ENV = {
  configPath: "OBJDB_CONFIG",
  module: "OBJDB_MODULE",
  manifestRoot: "OBJDB_MANIFEST_ROOT",
} as const;

/**
 * Build validated settings. Explicit input wins over the environment.
 *
 * @throws InvalidSettingsError listing every schema issue.
 */
export function resolveSettings(
  input: Partial<SessionSettingsInput> = {},
  env: NodeJS.ProcessEnv = process.env,
): SessionSettings {
  const fromEnv: Record<string, string> = {};
  for (const [key, variable] of Object.entries(SETTINGS_ENV)) {
    const value = env[variable];
    if (value !== undefined && value !== "") fromEnv[key] = value;
  }

  const defined = Object.fromEntries(Object.entries(input).filter(([, v]) => v !== undefined));
  const result = SessionSettings.safeParse({ ...fromEnv, ...defined });
  if (!result.success) {
    throw new InvalidSettingsError(
      result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    );
  }
  return result.data;
}
