import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { applyOverrides, defaultConfigDir, loadConfig } from "../src/config/loader.js";
import { resolveConfig } from "../src/config/validator.js";

const CONFIG_DIR = defaultConfigDir();

const CREDENTIALS = { GITLAB_BASE_URL: "https://gitlab.test", GITLAB_TOKEN: "test-secret" };

describe("config loader", () => {
  it("loads the shipped base config", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config).toEqual({
      schema_version: "1.0.0",
      timeout_ms: 15000,
      per_page: 100,
      format: "human",
    });
  });

  it("merges an env-specific overlay over base", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.format).toBe("jsonl");
    expect(config.timeout_ms).toBe(30000);
    // base fields still present
    expect(config.per_page).toBe(100);
  });

  it("returns base config when the overlay does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, {});
    expect(config.format).toBe("human");
  });

  it("reads the GitLab credentials from their usual variables", () => {
    const config = loadConfig(undefined, CONFIG_DIR, CREDENTIALS);
    expect(config.base_url).toBe("https://gitlab.test");
    expect(config.token).toBe("test-secret");
  });

  it("lets prefixed variables win over the aliases and the files", () => {
    const config = loadConfig("ci", CONFIG_DIR, {
      GITLAB_TOKEN: "alias-token",
      GLMR_TOKEN: "prefixed-token",
      GLMR_TIMEOUT_MS: "5000",
    });
    expect(config.token).toBe("prefixed-token");
    expect(config.timeout_ms).toBe("5000");
  });

  it("ignores variables that are set but empty", () => {
    const config = loadConfig(undefined, CONFIG_DIR, { GITLAB_TOKEN: "", GLMR_FORMAT: "" });
    expect(config.token).toBeUndefined();
    expect(config.format).toBe("human");
  });

  it("applies command-line overrides last, skipping unset ones", () => {
    const config = applyOverrides(loadConfig(undefined, CONFIG_DIR, CREDENTIALS), {
      base_url: "https://other.test",
      token: undefined,
      format: "jsonl",
    });
    expect(config.base_url).toBe("https://other.test");
    expect(config.token).toBe("test-secret");
    expect(config.format).toBe("jsonl");
  });

  describe("with a custom config directory", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "glmr-config-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("treats a missing or empty base file as empty", () => {
      expect(loadConfig(undefined, tmpDir, {})).toEqual({});
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "# nothing yet\n");
      expect(loadConfig(undefined, tmpDir, {})).toEqual({});
    });

    it("rejects a file that is not a mapping", () => {
      const file = path.join(tmpDir, "base.yaml");
      fs.writeFileSync(file, "- a\n- b\n");
      expect(() => loadConfig(undefined, tmpDir, {})).toThrow(`Config file must contain a mapping: ${file}`);
    });
  });
});

describe("config validator", () => {
  it("resolves a complete config, coercing environment strings", () => {
    const res = resolveConfig(loadConfig(undefined, CONFIG_DIR, { ...CREDENTIALS, GLMR_PER_PAGE: "50" }));
    expect(res).toEqual({
      ok: true,
      config: {
        schema_version: "1.0.0",
        base_url: "https://gitlab.test",
        token: "test-secret",
        timeout_ms: 15000,
        per_page: 50,
        format: "human",
      },
    });
  });

  it("fills defaults for missing tunables", () => {
    const res = resolveConfig({ schema_version: "1.0.0", base_url: "https://gitlab.test", token: "test-secret" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.config.timeout_ms).toBe(15000);
    expect(res.config.per_page).toBe(100);
    expect(res.config.format).toBe("human");
  });

  it("asks for the GitLab URL first", () => {
    expect(resolveConfig({ schema_version: "1.0.0" })).toEqual({
      ok: false,
      error: "GitLab URL must be provided via --gitlab-url or GITLAB_BASE_URL env",
    });
  });

  it("asks for the token when only the URL is set", () => {
    expect(resolveConfig({ schema_version: "1.0.0", base_url: "https://gitlab.test", token: "  " })).toEqual({
      ok: false,
      error: "GitLab token must be provided via --token or GITLAB_TOKEN env",
    });
  });

  it("rejects an out-of-range page size", () => {
    const res = resolveConfig({ ...loadConfig(undefined, CONFIG_DIR, CREDENTIALS), per_page: 500 });
    expect(res).toEqual({ ok: false, error: "Invalid configuration: config/per_page must be <= 100" });
  });

  it("rejects a non-HTTP base URL", () => {
    const res = resolveConfig({ ...loadConfig(undefined, CONFIG_DIR, CREDENTIALS), base_url: "ftp://gitlab.test" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toContain('config/base_url must match pattern "^https?://"');
  });

  it("rejects an unknown output format", () => {
    const res = resolveConfig({ ...loadConfig(undefined, CONFIG_DIR, CREDENTIALS), format: "xml" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toContain("config/format must be equal to one of the allowed values");
  });
});
