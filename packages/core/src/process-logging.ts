import { createWriteStream, mkdirSync } from "node:fs";
import { join } from "node:path";
import { resolveLogDir } from "./log-dir";
import { addLogSink } from "./logger";

export interface ProcessLoggingOptions {
  label?: string;
  logDir?: string;
}

// Mirrors every logger line of this process into <logDir>/<logName>.log
export function setupProcessLogging(
  logName: string,
  options: ProcessLoggingOptions = {},
): string | undefined {
  const logDir = options.logDir ?? resolveLogDir();

  try {
    mkdirSync(logDir, { recursive: true });
  } catch (error) {
    console.error(`[Logger] Failed to create log dir: ${logDir}`, error);
    return;
  }

  const logPath = join(logDir, `${logName}.log`);
  const stream = createWriteStream(logPath, { flags: "a" });
  stream.on("error", (error) => {
    console.error(`[Logger] Log file write failed: ${logPath}`, error);
  });
  const detach = addLogSink({ write: (line) => stream.write(line) });

  process.on("exit", () => {
    detach();
    stream.end();
  });

  const label = options.label ?? "Process";
  console.log(`[Logger] ${label} logs are written to ${logPath}`);
  return logPath;
}
