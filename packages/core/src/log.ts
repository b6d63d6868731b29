export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = Readonly<{
  level: LogLevel;
  message: string;
  fields?: Readonly<Record<string, string | number | boolean | null>>;
}>;

export type LogSink = (event: LogEvent) => void;

export function makeLogSink(log: LogSink | undefined): LogSink {
  if (typeof log === "function") return log;
  return () => {};
}
