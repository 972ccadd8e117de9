import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, isAbsolute, join } from "node:path";
import type { z } from "zod";
import {
  ProviderUnavailableError,
  TransientProviderError,
  truncateText,
  type CapabilityInput,
  type CapabilityOutput,
  type StageCapability,
} from "@factline/core";
import {
  AVAILABLE,
  createAbortError,
  unavailable,
  type CapabilityProvider,
  type InvokeContext,
  type ProbeResult,
} from "./capability-provider";

export interface CommandProviderOptions<C extends StageCapability> {
  name: string;
  capability: C;
  command: string;
  args?: string[];
  outputSchema: z.ZodType<CapabilityOutput<C>, z.ZodTypeDef, unknown>;
  env?: NodeJS.ProcessEnv;
  // SIGTERM first, SIGKILL after this grace
  killGraceMs?: number;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  if (command.includes("/") || isAbsolute(command)) {
    return (await isExecutable(command)) ? command : null;
  }
  for (const dir of (env.PATH ?? "").split(delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = join(dir, command);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

function lastLine(text: string): string {
  const lines = text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return truncateText(lines.at(-1) ?? "", 200);
}

// Capability served by a local program: JSON input on stdin, JSON output on stdout
export class CommandCapabilityProvider<C extends StageCapability> implements CapabilityProvider<C> {
  readonly name: string;
  readonly capability: C;

  constructor(private readonly options: CommandProviderOptions<C>) {
    this.name = options.name;
    this.capability = options.capability;
  }

  async probe(): Promise<ProbeResult> {
    const resolved = await findExecutable(this.options.command, this.options.env ?? process.env);
    return resolved ? AVAILABLE : unavailable(`command not installed: ${this.options.command}`);
  }

  invoke(input: CapabilityInput<C>, context: InvokeContext): Promise<CapabilityOutput<C>> {
    if (context.signal.aborted) {
      return Promise.reject(createAbortError(`${this.name} aborted before start`));
    }

    const useProcessGroup = process.platform !== "win32";
    const child = spawn(this.options.command, this.options.args ?? [], {
      env: { ...process.env, ...this.options.env },
      detached: useProcessGroup,
      stdio: ["pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let stdinError: string | null = null;

    const terminate = (signal: NodeJS.Signals): void => {
      if (child.exitCode !== null || child.signalCode !== null) {
        return;
      }
      const pid = child.pid;
      if (pid && useProcessGroup) {
        try {
          process.kill(-pid, signal);
          return;
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          stderr += `\nprocess group kill failed: ${message}`;
        }
      }
      child.kill(signal);
    };

    let killTimer: NodeJS.Timeout | null = null;
    const onAbort = (): void => {
      terminate("SIGTERM");
      killTimer = setTimeout(() => terminate("SIGKILL"), this.options.killGraceMs ?? 2000);
    };
    context.signal.addEventListener("abort", onAbort, { once: true });

    // Decode across chunk boundaries so split multi-byte characters survive
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (data: string) => {
      stdout += data;
    });
    child.stderr.on("data", (data: string) => {
      stderr += data;
    });
    // Broken pipe when the program exits before reading its input
    child.stdin.on("error", (error) => {
      stdinError = error.message;
    });
    child.stdin.end(JSON.stringify(input));

    return new Promise<CapabilityOutput<C>>((resolve, reject) => {
      const cleanup = (): void => {
        context.signal.removeEventListener("abort", onAbort);
        if (killTimer) {
          clearTimeout(killTimer);
        }
      };

      child.on("error", (error: NodeJS.ErrnoException) => {
        cleanup();
        if (error.code === "ENOENT" || error.code === "EACCES") {
          reject(new ProviderUnavailableError(this.name, `command not installed: ${this.options.command}`));
          return;
        }
        reject(new TransientProviderError(`${this.name} failed to start: ${error.message}`, { cause: error }));
      });

      child.on("close", (code, signal) => {
        cleanup();
        if (context.signal.aborted) {
          reject(createAbortError(`${this.name} aborted`));
          return;
        }
        if (code === 127) {
          reject(new ProviderUnavailableError(this.name, `command not installed: ${this.options.command}`));
          return;
        }
        if (code !== 0) {
          const reason =
            lastLine(stderr) || stdinError || (signal ? `killed by ${signal}` : `exit code ${code}`);
          reject(new TransientProviderError(`${this.name} exited with ${code ?? signal}: ${reason}`));
          return;
        }

        let body: unknown;
        try {
          body = JSON.parse(stdout);
        } catch {
          reject(new TransientProviderError(`${this.name} wrote invalid JSON to stdout`));
          return;
        }
        const parsed = this.options.outputSchema.safeParse(body);
        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const detail = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
          reject(new TransientProviderError(`${this.name} returned an unexpected payload (${detail})`));
          return;
        }
        resolve(parsed.data);
      });
    });
  }
}
