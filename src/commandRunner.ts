// Child process execution for git and the agent CLIs.
// Spawns a command in its own process group, collects stdout/stderr, and
// enforces a wall-clock timeout by killing the whole group. The timeout
// rejects as soon as it fires, even while a descendant still holds the
// output pipes. A missing executable and a timeout are raised as distinct
// error types; a non-zero exit is returned, not raised.
// Limitations: Output is buffered in memory. On Windows only the direct
//   child is killed.

import { spawn, type ChildProcess } from "child_process";

import { CommandNotFoundError, CommandTimeoutError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  input?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

// Groups still running when this process exits.
const liveGroups = new Set<ChildProcess>();

process.once("exit", () => {
  for (const child of liveGroups) killProcessGroup(child);
});

function killProcessGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    if (process.platform === "win32") {
      child.kill("SIGKILL");
    } else {
      process.kill(-child.pid, "SIGKILL");
    }
  } catch (error) {
    // ESRCH once every member has exited.
    logger.debug("Process group already gone.", {
      pid: child.pid,
      error: errorMessage(error),
    });
  }
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { cwd, timeoutMs, input } = options;
  logger.debug(`Spawning ${command}.`, { cwd, argCount: args.length });

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ["pipe", "pipe", "pipe"],
      detached: process.platform !== "win32",
    });
    liveGroups.add(child);

    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      liveGroups.delete(child);
      settle();
    };

    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => {
            killProcessGroup(child);
            child.stdin.destroy();
            child.stdout.destroy();
            child.stderr.destroy();
            finish(() => reject(new CommandTimeoutError(command, timeoutMs)));
          }, timeoutMs)
        : null;

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      finish(() =>
        reject(error.code === "ENOENT" ? new CommandNotFoundError(command) : error)
      );
    });

    // close waits for every holder of the pipes; with a timeout set, a
    // lingering descendant is cut off by the timer above.
    child.on("close", (code) => {
      finish(() => resolve({ exitCode: code, stdout, stderr }));
    });

    // EPIPE when the child exits before reading its input.
    child.stdin.on("error", (error: Error) => {
      logger.debug(`stdin of ${command} closed early.`, { error: error.message });
    });
    if (input !== undefined) {
      child.stdin.write(input);
    }
    child.stdin.end();
  });
};
