import { spawn } from 'node:child_process';

export type CommandInvocation = {
  command: string;
  args?: string[];
  /** Added to the runner's own environment */
  env?: Record<string, string>;
  /** Killed with SIGKILL once exceeded; no limit when omitted */
  timeoutMs?: number;
  /** 'inherit' hands the terminal to the child; stdout/stderr are then not captured */
  stdio?: 'pipe' | 'inherit';
};

export type CommandResult = {
  ok: boolean;
  /** -1 when the command could not start or was killed */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export interface CommandRunner {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

/**
 * Runs neighbor-table tools, interpreter checks and the smoke-test program.
 * Never rejects: a command that cannot start reports `exitCode: -1` with the
 * spawn error on stderr.
 */
export class ChildProcessRunner implements CommandRunner {
  async run(invocation: CommandInvocation): Promise<CommandResult> {
    const child = spawn(invocation.command, invocation.args ?? [], {
      env: { ...process.env, ...invocation.env },
      stdio: invocation.stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });

    const stdout: string[] = [];
    const stderr: string[] = [];
    child.stdout?.setEncoding('utf8').on('data', (chunk: string) => stdout.push(chunk));
    child.stderr?.setEncoding('utf8').on('data', (chunk: string) => stderr.push(chunk));

    let timedOut = false;
    const timer =
      invocation.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, invocation.timeoutMs);

    try {
      const exitCode = await new Promise<number | null>((resolve, reject) => {
        child.once('error', reject);
        child.once('close', resolve);
      });
      return {
        ok: exitCode === 0 && !timedOut,
        exitCode: exitCode ?? -1,
        stdout: stdout.join(''),
        stderr: stderr.join(''),
        timedOut,
      };
    } catch (err) {
      stderr.push(err instanceof Error ? err.message : String(err));
      return { ok: false, exitCode: -1, stdout: stdout.join(''), stderr: stderr.join('\n'), timedOut: false };
    } finally {
      clearTimeout(timer);
    }
  }
}
