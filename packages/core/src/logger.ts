// Structured logger shared by every process

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, "silent">;
  component: string;
  message: string;
  jobId?: string;
  tenantId?: string;
  stage?: string;
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  component: string;
  jobId?: string;
  tenantId?: string;
  stage?: string;
  minLevel?: LogLevel;
  jsonOutput?: boolean;
}

// Extra destinations (e.g. the process log file) that receive every printed line
export interface LogSink {
  write(line: string): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const sinks = new Set<LogSink>();

export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink);
  return () => {
    sinks.delete(sink);
  };
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return normalized;
    default:
      return fallback;
  }
}

export class Logger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = {
      minLevel: "info",
      jsonOutput: false,
      ...config,
    };
  }

  // Child logger carrying extra context
  child(context: Partial<LoggerConfig>): Logger {
    return new Logger({
      ...this.config,
      ...context,
    });
  }

  private log(
    level: Exclude<LogLevel, "silent">,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel ?? "info"]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...(this.config.jobId && { jobId: this.config.jobId }),
      ...(this.config.tenantId && { tenantId: this.config.tenantId }),
      ...(this.config.stage && { stage: this.config.stage }),
      ...(metadata && { metadata }),
    };

    const line = this.config.jsonOutput
      ? JSON.stringify(entry)
      : `${this.formatPrefix(entry)} ${message}${metadata ? ` ${JSON.stringify(metadata)}` : ""}`;

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
    }
    for (const sink of sinks) {
      sink.write(`${line}\n`);
    }
  }

  private formatPrefix(entry: LogEntry): string {
    const time = entry.timestamp.split("T")[1]?.slice(0, 8) ?? "";
    const level = entry.level.toUpperCase().padEnd(5);
    const job = entry.jobId ? `[${entry.jobId.slice(0, 8)}]` : "";
    const stage = entry.stage ? `[${entry.stage}]` : "";
    return `${time} ${level} [${entry.component}]${job}${stage}`;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log("debug", message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log("info", message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log("warn", message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.log("error", message, metadata);
  }

  stageStart(stage: string, description: string): void {
    this.info(`[${stage}] ${description}`, { stage, event: "stage_start" });
  }

  stageComplete(stage: string, durationMs: number, outcome: string): void {
    this.info(`[${stage}] ${outcome} in ${durationMs}ms`, {
      stage,
      event: "stage_complete",
      outcome,
      durationMs,
    });
  }

  stageFailed(stage: string, error: string): void {
    this.error(`[${stage}] Failed: ${error}`, {
      stage,
      event: "stage_failed",
      error,
    });
  }

  retry(provider: string, attempt: number, maxAttempts: number, reason: string, delayMs: number): void {
    this.warn(`Retrying ${provider} (${attempt}/${maxAttempts}) in ${delayMs}ms: ${reason}`, {
      event: "retry",
      provider,
      attempt,
      maxAttempts,
      delayMs,
      reason,
    });
  }
}

export function createLogger(
  component: string,
  options: { level?: LogLevel; format?: "json" | "text" } = {},
): Logger {
  return new Logger({
    component,
    minLevel: options.level ?? "info",
    jsonOutput: options.format === "json",
  });
}
