import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { ConfigOverrides } from "../types/config.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "GLMR_";

/** Variables the GitLab tooling ecosystem already uses; `GLMR_*` wins over them. */
const ENV_ALIASES: Record<string, string> = {
  GITLAB_BASE_URL: "base_url",
  GITLAB_TOKEN: "token",
};

export type RawConfig = Record<string, unknown>;

export function defaultConfigDir(): string {
  return CONFIG_DIR;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Non-empty environment values only; an exported-but-empty variable does not override. */
function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const result = { ...config };

  for (const [name, key] of Object.entries(ENV_ALIASES)) {
    const value = env[name];
    if (value) result[key] = value;
  }

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(ENV_PREFIX) || !value) continue;
    // GLMR_PER_PAGE → per_page
    result[name.slice(ENV_PREFIX.length).toLowerCase()] = value;
  }

  return result;
}

/** Command-line values win over every file and environment layer. */
export function applyOverrides(config: RawConfig, overrides: ConfigOverrides): RawConfig {
  const result = { ...config };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined && value !== "") result[key] = value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← GITLAB_* ← GLMR_* variables.
 *
 * The result is unvalidated; pass it through `resolveConfig`.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = { ...merged, ...loadYaml(path.join(dir, `${envName}.yaml`)) };
  }

  return applyEnvOverrides(merged, env);
}
