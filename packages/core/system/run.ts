import { spawn } from "node:child_process";

export type RunOptions = {
  /** Text written to the program's stdin */
  input?: string;
  timeoutMs: number;
};

export type RunResult = {
  /** Exit code, null when the program was killed or never started */
  code: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
};

export type CommandRunner = (command: string, args: string[], options: RunOptions) => Promise<RunResult>;

/**
 * Run an external program with a bounded timeout. Never rejects: spawn errors
 * and timeouts come back in the result.
 *
 * With `input`, the run ends at process exit rather than stream close, since
 * selection owners like xclip fork a child that keeps the output pipes open.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve) => {
    const withInput = options.input !== undefined;
    let stdout = "";
    let stderr = "";
    let settled = false;

    const child = spawn(command, args, {
      stdio: withInput ? ["pipe", "ignore", "ignore"] : ["ignore", "pipe", "pipe"],
    });

    const finish = (result: RunResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      finish({
        code: null,
        stdout,
        stderr,
        error: new Error(`${command} timed out after ${options.timeoutMs}ms`),
      });
    }, options.timeoutMs);

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (err) => finish({ code: null, stdout, stderr, error: err }));
    if (withInput) {
      child.on("exit", (code) => finish({ code, stdout, stderr }));
      child.stdin?.on("error", (err) => finish({ code: null, stdout, stderr, error: err }));
      child.stdin?.end(options.input);
    } else {
      child.on("close", (code) => finish({ code, stdout, stderr }));
    }
  });

export async function isToolAvailable(
  command: string,
  args: string[],
  run: CommandRunner = runCommand,
  timeoutMs = 5000
): Promise<boolean> {
  const result = await run(command, args, { timeoutMs });
  return result.code === 0;
}

export function describeFailure(result: RunResult): string {
  if (result.error) return result.error.message;
  const detail = result.stderr.trim();
  return detail ? `exit code ${result.code}: ${detail}` : `exit code ${result.code}`;
}
