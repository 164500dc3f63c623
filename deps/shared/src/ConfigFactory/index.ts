import {
  type Static,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly key: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * 以 TypeBox schema 從環境變數建立設定。
 * 只取 schema 有宣告的鍵；空字串視為未設定。結果會快取。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Env = process.env
): () => Static<T> {
  let cached: Static<T> | undefined;
  return () => {
    if (cached !== undefined) return cached;

    const raw: Record<string, unknown> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") raw[key] = value;
    }

    const value = Value.Convert(schema, Value.Default(schema, raw));
    if (!Value.Check(schema, value)) {
      const first = Value.Errors(schema, value).First();
      const key = first?.path.replace(/^\//, "") ?? "";
      throw new ConfigError(
        `環境變數 ${key} 不合法：${first?.message ?? "未知錯誤"}`,
        key
      );
    }
    cached = value;
    return value;
  };
}

/** 接受 true/false/1/0 */
export function envBoolean() {
  return t.Boolean();
}
