/**
 * Config loader.
 *
 * Two-phase validation: YAML parse, then Zod schema validation.
 * A missing file is not an error; the defaults apply.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as yamlParse } from "yaml";
import { DtcalcConfigSchema, type DtcalcConfig } from "./config-types.js";

export const DEFAULT_CONFIG: DtcalcConfig = DtcalcConfigSchema.parse({});

export interface ConfigError {
  phase: "yaml_parse" | "schema_validation";
  path: string[];
  message: string;
}

export type LoadResult =
  | { status: "loaded"; config: DtcalcConfig; filePath: string }
  | { status: "missing"; config: DtcalcConfig }
  | { status: "error"; errors: ConfigError[] };

/**
 * Read an environment variable, ignoring empty values and unexpanded
 * `${VAR}` literals left behind by MCP client configs.
 */
export function resolveEnv(name: string): string | undefined {
  const val = process.env[name];
  if (!val || val.startsWith("${")) return undefined;
  return val;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

export function defaultConfigPath(): string {
  return expandHome(resolveEnv("DTCALC_CONFIG") ?? "~/.dtcalc.yml");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Load and validate a config file.
 *
 * Returns a discriminated union:
 * - "loaded": valid config parsed from file
 * - "missing": file not found, returns defaults
 * - "error": YAML parse or schema validation errors
 */
export async function loadConfig(configPath: string): Promise<LoadResult> {
  let contents: string;
  try {
    contents = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      return { status: "missing", config: DEFAULT_CONFIG };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yamlParse(contents);
  } catch (err) {
    return {
      status: "error",
      errors: [
        {
          phase: "yaml_parse",
          path: [],
          message: err instanceof Error ? err.message : String(err),
        },
      ],
    };
  }

  // An empty file parses to null
  const result = DtcalcConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const errors: ConfigError[] = result.error.issues.map((issue) => ({
      phase: "schema_validation" as const,
      path: issue.path.map(String),
      message: issue.message,
    }));
    return { status: "error", errors };
  }

  return { status: "loaded", config: result.data, filePath: configPath };
}

/**
 * Load the config for the shell, falling back to defaults (with a warning
 * on stderr) when the file is invalid.
 */
export async function loadConfigOrDefaults(
  configPath: string = defaultConfigPath(),
): Promise<DtcalcConfig> {
  const result = await loadConfig(configPath);
  if (result.status !== "error") return result.config;

  console.error(`[dtcalc] Warning: ignoring invalid config ${configPath}:`);
  for (const e of result.errors) {
    const where = e.path.length > 0 ? e.path.join(".") : "(root)";
    console.error(`  ${where}: ${e.message}`);
  }
  return DEFAULT_CONFIG;
}
