export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }

  return "info";
}

function timestamp(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLogLevel(process.env.LOG_LEVEL)];
}

export const logger = {
  debug(message: string): void {
    if (enabled("debug")) {
      console.log(`[${timestamp()}] DEBUG ${message}`);
    }
  },
  info(message: string): void {
    if (enabled("info")) {
      console.log(`[${timestamp()}] INFO ${message}`);
    }
  },
  warn(message: string): void {
    if (enabled("warn")) {
      console.warn(`[${timestamp()}] WARN ${message}`);
    }
  },
  error(message: string): void {
    console.error(`[${timestamp()}] ERROR ${message}`);
  }
};
