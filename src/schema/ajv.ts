import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvValidateFn<T> = ((data: unknown) => data is T) & { errors?: unknown };

export type AjvInstance = {
  compile: <T>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: unknown, opts?: { dataVar?: string }) => string;
};

export type AjvOptions = {
  /** Convert string values from the environment to the schema's number/boolean types. */
  coerceTypes?: boolean;
  /** Fill missing properties from the schema's `default`s. */
  useDefaults?: boolean;
};

export function loadAjv(opts: AjvOptions = {}): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance, formats: string[]) => void;

  const ajv = new AjvCtor({
    allErrors: true,
    strict: true,
    coerceTypes: opts.coerceTypes ?? false,
    useDefaults: opts.useDefaults ?? false,
  });
  add(ajv, ["uri"]);

  return ajv;
}
