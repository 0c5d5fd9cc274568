import { spawn } from "child_process";
import type { CommandOptions, CommandResult, CommandRunner } from "./types";

const MAX_OUTPUT_LENGTH = 20000;

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutMs?: number) {}

  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeoutMs;

    return new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options?.cwd ?? process.cwd(),
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"]
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer = timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : undefined;

      child.stdout.on("data", (chunk: Buffer | string) => {
        stdout = trimText(stdout + chunk.toString(), MAX_OUTPUT_LENGTH);
      });

      child.stderr.on("data", (chunk: Buffer | string) => {
        stderr = trimText(stderr + chunk.toString(), MAX_OUTPUT_LENGTH);
      });

      child.on("error", (error) => {
        clearTimeout(timer);
        reject(error);
      });

      child.on("close", (code, signal) => {
        clearTimeout(timer);
        resolve({
          code: typeof code === "number" ? code : null,
          signal,
          stdout,
          stderr: timedOut ? `${stderr}\nCommand timeout after ${timeoutMs}ms`.trim() : stderr,
          timedOut
        });
      });
    });
  }
}

export function commandSucceeded(result: CommandResult): boolean {
  return !result.timedOut && result.code === 0;
}

/**
 * The most useful text to show for a failed command: stderr, then stdout.
 */
export function describeFailure(result: CommandResult, fallback: string): string {
  const detail = (result.stderr || result.stdout).trim();
  return trimText(detail || fallback, 1200);
}

export function trimText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(text.length - maxLength);
}
