import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

// <repo>/raw-logs, three levels above packages/core/src
const DEFAULT_LOG_DIR = fileURLToPath(new URL("../../../raw-logs", import.meta.url));

export function resolveLogDir(options: { env?: NodeJS.ProcessEnv; fallbackDir?: string } = {}): string {
  const env = options.env ?? process.env;
  const candidate = env.FACTLINE_LOG_DIR?.trim();
  if (candidate) {
    return resolve(candidate);
  }
  return resolve(options.fallbackDir ?? DEFAULT_LOG_DIR);
}
