import { existsSync, readFileSync } from "fs";
import { resolve, basename } from "path";
import { pathToFileURL } from "url";
import { configSchema, type ResolvedConfig } from "./schema.js";

const CONFIG_FILENAMES = [
  "behaves.config.js",
  "behaves.config.mjs",
  "behaves.config.json",
];

export function findConfigFile(cwd: string): string | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = resolve(cwd, filename);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Load and validate the project's config. Without a config file every
 * setting takes its default.
 */
export async function loadConfig(cwd: string): Promise<ResolvedConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return parseConfig({});
  }

  let rawConfig: unknown;

  if (configPath.endsWith(".json")) {
    rawConfig = JSON.parse(readFileSync(configPath, "utf-8"));
  } else {
    const mod: unknown = await import(pathToFileURL(configPath).href);
    rawConfig = defaultExport(mod);
  }

  return parseConfig(rawConfig, basename(configPath));
}

export function parseConfig(
  rawConfig: unknown,
  source: string = "config"
): ResolvedConfig {
  const result = configSchema.safeParse(rawConfig ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

function defaultExport(mod: unknown): unknown {
  if (typeof mod === "object" && mod !== null && "default" in mod) {
    return mod.default;
  }
  return mod;
}
