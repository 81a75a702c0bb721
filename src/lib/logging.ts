export type LogValue = unknown;
export type LogLevel = "debug" | "info" | "warn" | "error";

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveThreshold(): number {
  const configured = String(process.env.LOG_LEVEL || "").trim().toLowerCase();
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return levelRank[configured];
  }
  return levelRank.info;
}

function emit(level: LogLevel, event: string, fields: Record<string, LogValue>): void {
  if (levelRank[level] < resolveThreshold()) {
    return;
  }

  const payload = {
    level,
    event,
    service: "idea2deploy",
    timestamp: new Date().toISOString(),
    ...fields
  };

  const serialized = JSON.stringify(payload);

  if (level === "error" || level === "warn") {
    console.error(serialized);
    return;
  }

  console.log(serialized);
}

export function logDebug(event: string, fields: Record<string, LogValue> = {}): void {
  emit("debug", event, fields);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const kind = "kind" in error && typeof error.kind === "string" ? error.kind : undefined;
    return {
      message: error.message,
      ...(kind ? { kind } : {}),
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}
