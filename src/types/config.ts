/** Configuration types: base.yaml ← env.yaml ← environment ← flags. */
export type OutputFormat = "human" | "jsonl";

export type ToolConfig = {
  schema_version: string;
  base_url: string;
  token: string;
  timeout_ms: number;
  per_page: number;
  format: OutputFormat;
};

/** Values supplied on the command line; undefined means "not given". */
export type ConfigOverrides = {
  base_url?: string;
  token?: string;
  format?: string;
};
