import { loadAjv } from "../schema/ajv.js";
import type { ToolConfig } from "../types/config.js";
import type { RawConfig } from "./loader.js";

/** Environment strings are coerced; missing tunables take their defaults. */
const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "base_url", "token"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    base_url: { type: "string", format: "uri", pattern: "^https?://" },
    token: { type: "string", minLength: 1 },
    timeout_ms: { type: "integer", minimum: 1, default: 15000 },
    per_page: { type: "integer", minimum: 1, maximum: 100, default: 100 },
    format: { type: "string", enum: ["human", "jsonl"], default: "human" },
  },
};

export type ConfigResolution =
  | { ok: true; config: ToolConfig }
  | { ok: false; error: string };

function isBlank(value: unknown): boolean {
  return typeof value !== "string" || value.trim() === "";
}

/** Validate a loaded config and narrow it to `ToolConfig`. */
export function resolveConfig(raw: RawConfig): ConfigResolution {
  if (isBlank(raw.base_url)) {
    return { ok: false, error: "GitLab URL must be provided via --gitlab-url or GITLAB_BASE_URL env" };
  }
  if (isBlank(raw.token)) {
    return { ok: false, error: "GitLab token must be provided via --token or GITLAB_TOKEN env" };
  }

  const ajv = loadAjv({ coerceTypes: true, useDefaults: true });
  const validate = ajv.compile<ToolConfig>(CONFIG_SCHEMA);
  const data: unknown = { ...raw };

  if (validate(data)) return { ok: true, config: data };
  return { ok: false, error: `Invalid configuration: ${ajv.errorsText(validate.errors, { dataVar: "config" })}` };
}
