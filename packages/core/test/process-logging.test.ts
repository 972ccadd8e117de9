import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../src/logger";
import { setupProcessLogging } from "../src/process-logging";

describe("setupProcessLogging", () => {
  const dirs: string[] = [];

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("mirrors logger lines into <logDir>/<name>.log", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const dir = mkdtempSync(join(tmpdir(), "factline-logs-"));
    dirs.push(dir);

    const logPath = setupProcessLogging("dispatcher", { logDir: dir, label: "Dispatcher" });
    expect(logPath).toBe(join(dir, "dispatcher.log"));
    expect(console.log).toHaveBeenCalledWith(`[Logger] Dispatcher logs are written to ${logPath}`);

    new Logger({ component: "dispatcher" }).info("Promoted 2 job(s)");

    await vi.waitFor(() => {
      const target = join(dir, "dispatcher.log");
      expect(existsSync(target)).toBe(true);
      expect(readFileSync(target, "utf-8")).toContain(" [dispatcher] Promoted 2 job(s)\n");
    });
  });
});
