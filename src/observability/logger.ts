type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface CorrelationContext {
  requestId?: string | null;
  agentId?: string | null;
}

export interface LogFields {
  [key: string]: unknown;
}

const toLogEntry = (
  level: LogLevel,
  event: string,
  context: CorrelationContext,
  fields: LogFields
): Record<string, unknown> => ({
  ts: new Date().toISOString(),
  level,
  event,
  request_id: context.requestId ?? null,
  agent_id: context.agentId ?? null,
  ...fields
});

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "trace" ||
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return "info";
};

// Read from process.env directly so the logger stays usable while config is still parsing.
const configuredLogLevel = parseLogLevel(process.env.LOG_LEVEL);

export const isLogLevelEnabled = (level: LogLevel): boolean =>
  LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[configuredLogLevel];

const emit = (entry: Record<string, unknown>, level: LogLevel): void => {
  if (!isLogLevelEnabled(level)) {
    return;
  }
  const serialized = JSON.stringify(entry);
  if (level === "error") {
    console.error(serialized);
    return;
  }
  if (level === "warn") {
    console.warn(serialized);
    return;
  }
  console.info(serialized);
};

export type LogFunction = (event: string, context: CorrelationContext, fields?: LogFields) => void;

export const logInfo: LogFunction = (event, context, fields = {}) => {
  emit(toLogEntry("info", event, context, fields), "info");
};

export const logDebug: LogFunction = (event, context, fields = {}) => {
  emit(toLogEntry("debug", event, context, fields), "debug");
};

export const logTrace: LogFunction = (event, context, fields = {}) => {
  emit(toLogEntry("trace", event, context, fields), "trace");
};

export const logWarn: LogFunction = (event, context, fields = {}) => {
  emit(toLogEntry("warn", event, context, fields), "warn");
};

export const logError: LogFunction = (event, context, fields = {}) => {
  emit(toLogEntry("error", event, context, fields), "error");
};

export const serializeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Error) {
    const kind = "kind" in error && typeof error.kind === "string" ? error.kind : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(kind ? { kind } : {})
    };
  }
  return { message: String(error) };
};
