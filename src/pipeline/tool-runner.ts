/**
 * External tool invocation.
 *
 * The orchestrator only talks to a ToolRunner, so tests can swap the real
 * subprocess runner for an in-process fake.
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { StageName } from "../types/index.js";

export interface ToolInvocation {
  readonly stage: StageName;
  readonly command: string;
  readonly args: readonly string[];
  /** Working directory of the tool */
  readonly cwd: string;
  /** Extra environment merged over the current process environment */
  readonly env: Readonly<Record<string, string>>;
  /** Kill the tool after this many ms; undefined waits indefinitely */
  readonly timeoutMs?: number;
}

export interface ToolResult {
  /** Exit code, or null when the tool was killed or never started */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  /** Set when the process could not be started (e.g. binary not found) */
  readonly spawnError?: string;
}

export type OutputListener = (line: string) => void;

export interface ToolRunner {
  run(invocation: ToolInvocation, onLine: OutputListener): Promise<ToolResult>;
}

/**
 * Render an invocation as a shell-like command line for logs.
 */
export function formatCommandLine(invocation: ToolInvocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * Runs tools as child processes, streaming stdout and stderr line by line.
 *
 * Each tool leads its own process group. A timeout kills the whole group and
 * settles as soon as the tool itself exits, even if a descendant that
 * escaped the kill still holds the output pipes.
 */
export class SpawnToolRunner implements ToolRunner {
  run(invocation: ToolInvocation, onLine: OutputListener): Promise<ToolResult> {
    return new Promise<ToolResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      const child = spawn(invocation.command, [...invocation.args], {
        cwd: invocation.cwd,
        env: { ...process.env, ...invocation.env },
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });

      const settle = (result: ToolResult): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        child.stdout.destroy();
        child.stderr.destroy();
        resolve(result);
      };

      const killGroup = (): void => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, "SIGKILL");
        } catch {
          // Group already gone; fall back to the direct child
          child.kill("SIGKILL");
        }
      };

      createInterface({ input: child.stdout }).on("line", onLine);
      createInterface({ input: child.stderr }).on("line", onLine);

      if (invocation.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          timedOut = true;
          killGroup();
        }, invocation.timeoutMs);
      }

      child.on("error", (err) => {
        settle({ exitCode: null, signal: null, timedOut, spawnError: err.message });
      });

      child.on("exit", (code, signal) => {
        if (timedOut) settle({ exitCode: code, signal, timedOut });
      });

      child.on("close", (code, signal) => {
        settle({ exitCode: code, signal, timedOut });
      });
    });
  }
}
