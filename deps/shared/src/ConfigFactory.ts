import type { StaticDecode, TObject, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`環境變數設定錯誤:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * 以 TypeBox schema 驗證環境變數，回傳帶快取的取值函式。
 * 只挑出 schema 宣告的 key，其餘環境變數不會進入結果。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): () => StaticDecode<T> {
  let cached: StaticDecode<T> | undefined;
  return () => {
    if (cached) return cached;
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    cached = decode(schema, picked);
    return cached;
  };
}

function decode<T extends TSchema>(schema: T, raw: unknown): StaticDecode<T> {
  const withDefaults = Value.Default(schema, raw);
  if (!Value.Check(schema, withDefaults)) {
    const issues = [...Value.Errors(schema, withDefaults)].map(
      (e) => `${e.path}: ${e.message}`
    );
    throw new ConfigError(issues);
  }
  return Value.Decode(schema, withDefaults);
}
