export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogLevelSetting = LogLevel | "silent";

export const logLevelOrder: Record<LogLevelSetting, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

/**
 * 呼叫端傳入的 context。
 * - event：覆蓋輸出中的等級標籤，也用來挑 emoji
 * - emoji：直接指定 emoji
 * - error：會被序列化並輸出 stack
 * 其餘欄位以 JSON 附加在訊息後
 */
export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event?: string;
  msg: string;
  err?: SerializedError;
  context: Record<string, unknown>;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface Logger {
  trace(): TemplateLog;
  trace(context: LogContext): TemplateLog;
  trace(message: string): void;
  trace(context: LogContext, message: string): void;

  debug(): TemplateLog;
  debug(context: LogContext): TemplateLog;
  debug(message: string): void;
  debug(context: LogContext, message: string): void;

  info(): TemplateLog;
  info(context: LogContext): TemplateLog;
  info(message: string): void;
  info(context: LogContext, message: string): void;

  warn(): TemplateLog;
  warn(context: LogContext): TemplateLog;
  warn(message: string): void;
  warn(context: LogContext, message: string): void;

  error(): TemplateLog;
  error(context: LogContext): TemplateLog;
  error(message: string): void;
  error(context: LogContext, message: string): void;

  /** 新增一層命名空間（輸出為 a:b:c） */
  extend(namespace: string, context?: LogContext): Logger;

  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;

  attachTransport(transport: LogTransport): void;
}
