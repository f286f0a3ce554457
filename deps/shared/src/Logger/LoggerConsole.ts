import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogLevelSetting,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevelOrder,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const consoleMethod: Record<LogLevel, "debug" | "info" | "warn" | "error"> = {
  trace: "debug",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
};

export class LoggerConsole implements Logger, AsyncDisposable {
  private readonly transports: LogTransport[];

  constructor(
    private readonly level: LogLevelSetting,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = defaultEmojiMap,
    transports: LogTransport[] = []
  ) {
    this.transports = transports;
  }

  trace(): TemplateLog;
  trace(context: LogContext): TemplateLog;
  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("trace", a, b);
  }

  debug(): TemplateLog;
  debug(context: LogContext): TemplateLog;
  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("debug", a, b);
  }

  info(): TemplateLog;
  info(context: LogContext): TemplateLog;
  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("info", a, b);
  }

  warn(): TemplateLog;
  warn(context: LogContext): TemplateLog;
  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("warn", a, b);
  }

  error(): TemplateLog;
  error(context: LogContext): TemplateLog;
  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("error", a, b);
  }

  extend(namespace: string, context: LogContext = {}): Logger {
    return new LoggerConsole(
      this.level,
      [...this.path, namespace],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): Logger {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  /** transport 與 extend 出來的子 logger 共用 */
  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport */
  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private dispatch(
    level: LogLevel,
    a: LogContext | string | undefined,
    b: string | undefined
  ): TemplateLog | undefined {
    if (typeof a === "string") {
      this.write(level, {}, a, a);
      return;
    }
    if (b !== undefined) {
      this.write(level, a ?? {}, b, b);
      return;
    }
    const callContext = a ?? {};
    return (strings, ...values) => {
      const templateContext: Record<string, unknown> = {};
      let message = strings[0] ?? "";
      let plain = message;
      values.forEach((value, i) => {
        templateContext[`__${i}`] = value;
        message += kleur.green(String(value)) + (strings[i + 1] ?? "");
        plain += String(value) + (strings[i + 1] ?? "");
      });
      this.write(level, { ...callContext, ...templateContext }, message, plain);
    };
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    plainMessage: string
  ) {
    if (logLevelOrder[level] < logLevelOrder[this.level]) return;

    const { event, emoji: callEmoji, error, ...rest } = callContext;
    const {
      event: _inheritedEvent,
      emoji: inheritedEmoji,
      error: _inheritedError,
      ...inherited
    } = this.context;
    const context = { ...inherited, ...rest };

    const label = event ?? level;
    const emoji =
      callEmoji ??
      (event ? this.emojiMap[event] : undefined) ??
      (level === "warn" || level === "error" ? this.emojiMap[level] : undefined) ??
      inheritedEmoji ??
      this.emojiMap[level] ??
      "";

    const prefix = [...this.path, label].join(":");
    const json = Object.keys(context).length > 0 ? ` ${safeJson(context)}` : "";
    const line = `${emoji} ${prefix}: ${message}${json}`;
    const err = error === undefined ? undefined : serializeError(error);

    const out = console[consoleMethod[level]];
    out(line);
    if (err?.stack) out(kleur.gray(err.stack));
    else if (err) out(kleur.gray(`${err.name}: ${err.message}`));

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event,
      msg: plainMessage,
      err,
      context,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "NonError", message: String(error) };
}

function safeJson(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch {
    return "[unserializable context]";
  }
}
