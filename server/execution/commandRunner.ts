import { execFile } from "child_process";

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  signal: AbortSignal;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
};

export interface CommandRunner {
  run(command: string, args: readonly string[], opts: RunOptions): Promise<CommandResult>;
}

export class CommandFailedError extends Error {
  public readonly command: string;
  public readonly exitCode: number | undefined;
  public readonly stderr: string;

  constructor(command: string, exitCode: number | undefined, stderr: string, reason: string) {
    const detail = stderr.trim() || reason;
    super(`"${command}" exited${exitCode === undefined ? "" : ` with code ${exitCode}`}: ${detail}`);
    this.name = "CommandFailedError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export class ExecFileCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], opts: RunOptions): Promise<CommandResult> {
    const commandLine = [command, ...args].join(" ");
    return new Promise((resolve, reject) => {
      const child = execFile(
        command,
        [...args],
        { signal: opts.signal, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf8" },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ stdout, stderr });
            return;
          }
          // Aborts propagate unchanged; the caller owns the timeout.
          if (err.name === "AbortError") {
            reject(err);
            return;
          }
          const exitCode = typeof err.code === "number" ? err.code : undefined;
          reject(new CommandFailedError(commandLine, exitCode, stderr, err.message));
        },
      );
      if (opts.input !== undefined) {
        child.stdin?.end(opts.input);
      }
    });
  }
}
