export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];

/** 實際可輸出的等級（silent 只用於門檻） */
export type EmitLevel = Exclude<LogLevel, "silent">;

/**
 * 記錄時附帶的上下文。
 * - event：事件名稱，輸出時接在 namespace 之後；未指定時使用等級名稱
 * - emoji：覆寫輸出前綴的 emoji
 * - error：錯誤物件，會另外輸出 stack
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLogFn = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (): TemplateLogFn;
  (message: string): void;
  (context: LogContext): TemplateLogFn;
  (context: LogContext, message: string): void;
}

export type LogRecord = {
  level: EmitLevel;
  time: string;
  path: string[];
  event: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport {
  write(record: LogRecord): void;
  close(): Promise<void>;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，namespace 接在目前路徑之後 */
  extend(namespace: string, context?: LogContext): Logger;

  /** 建立只合併上下文、不改變路徑的 logger */
  append(context: LogContext): Logger;
}
