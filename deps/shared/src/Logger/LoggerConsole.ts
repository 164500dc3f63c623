import kleur from "kleur";

import type {
  EmitLevel,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  TemplateLogFn,
} from "./Logger";

export type EmojiMap = Record<string, string>;

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

const consoleMethod: Record<EmitLevel, "debug" | "info" | "warn" | "error"> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

type WriteFn = (
  context: LogContext,
  strings: readonly string[],
  values: unknown[]
) => void;

function createLogMethod(write: WriteFn): LogMethod {
  function log(): TemplateLogFn;
  function log(message: string): void;
  function log(context: LogContext): TemplateLogFn;
  function log(context: LogContext, message: string): void;
  function log(
    contextOrMessage?: LogContext | string,
    message?: string
  ): TemplateLogFn | void {
    if (typeof contextOrMessage === "string") {
      write({}, [contextOrMessage], []);
      return;
    }
    const context = contextOrMessage ?? {};
    if (message !== undefined) {
      write(context, [message], []);
      return;
    }
    return (strings, ...values) => write(context, strings, values);
  }
  return log;
}

/**
 * 輸出到 console 的 logger。
 *
 * 輸出格式：`<emoji> <path>:<event>: <訊息> <上下文 JSON>`
 * - 樣板字串中的插值會以綠色標示，並以 `__0`、`__1`… 記錄到上下文
 * - emoji 依序取 context.emoji → emojiMap[event] → emojiMap[level]
 * - 子 logger 與父 logger 共用 transports
 */
export class LoggerConsole implements Logger {
  readonly trace: LogMethod = createLogMethod((c, s, v) =>
    this.emit("trace", c, s, v)
  );
  readonly debug: LogMethod = createLogMethod((c, s, v) =>
    this.emit("debug", c, s, v)
  );
  readonly info: LogMethod = createLogMethod((c, s, v) =>
    this.emit("info", c, s, v)
  );
  readonly warn: LogMethod = createLogMethod((c, s, v) =>
    this.emit("warn", c, s, v)
  );
  readonly error: LogMethod = createLogMethod((c, s, v) =>
    this.emit("error", c, s, v)
  );

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {}

  extend(namespace: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, namespace],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport，通常在程式結束前呼叫 */
  async close() {
    await Promise.all(this.transports.map((t) => t.close()));
    this.transports.length = 0;
  }

  private emit(
    level: EmitLevel,
    context: LogContext,
    strings: readonly string[],
    values: unknown[]
  ) {
    if (levelOrder[level] < levelOrder[this.level]) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...context };
    const eventName = event ?? level;

    let plain = "";
    let colored = "";
    strings.forEach((s, i) => {
      plain += s;
      colored += s;
      if (i < values.length) {
        const text = formatValue(values[i]);
        plain += text;
        colored += kleur.green(text);
      }
    });

    const data: Record<string, unknown> = { ...rest };
    values.forEach((v, i) => {
      data[`__${i}`] = v;
    });
    const errorInfo = error instanceof Error ? describeError(error) : undefined;
    if (error !== undefined && !errorInfo) data.error = error;

    const icon =
      emoji ?? this.emojiMap[eventName] ?? this.emojiMap[level] ?? "";
    const label = [...this.path, eventName].join(":");
    const json =
      Object.keys(data).length > 0 ? kleur.gray(safeStringify(data)) : "";
    const line = [icon, `${label}: ${colored}`, json]
      .filter((part) => part !== "")
      .join(" ");

    const method = consoleMethod[level];
    console[method](line);
    if (errorInfo) {
      console[method](
        errorInfo.stack ?? `${errorInfo.name}: ${errorInfo.message}`
      );
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      level,
      time: new Date().toISOString(),
      path: this.path,
      event: eventName,
      msg: plain,
      context: data,
      err: errorInfo,
    };
    for (const transport of this.transports) transport.write(record);
  }
}

function describeError(error: Error) {
  return { name: error.name, message: error.message, stack: error.stack };
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object" && value !== null) return safeStringify(value);
  return String(value);
}

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (v instanceof Error) return describeError(v);
      if (typeof v === "bigint") return v.toString();
      return v;
    });
  } catch {
    return "[unserializable]";
  }
}
