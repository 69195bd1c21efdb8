/**
 * Promote Runtime Host — Subprocess Execution Adapter
 *
 * Uses node:child_process.spawn for all subprocess execution. Every
 * subprocess runs in the working directory fixed at construction time; the
 * git version control adapter binds it to the repository root so that no
 * command can run relative to an arbitrary directory.
 */

import { spawn } from 'node:child_process';

// ---------------------------------------------------------------------------
// ExecAdapter
// ---------------------------------------------------------------------------

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ExecOptions {
  /** Extra variables layered over the parent environment. */
  readonly env?: Readonly<Record<string, string>> | undefined;
  readonly timeoutMs?: number | undefined;
}

/**
 * Runs a command to completion and collects its output.
 *
 * A non-zero exit status resolves normally; only a process that cannot be
 * started (missing binary, bad cwd) rejects.
 */
export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options?: ExecOptions): Promise<ExecResult>;
}

// ---------------------------------------------------------------------------
// NodeExecAdapter
// ---------------------------------------------------------------------------

export class NodeExecAdapter implements ExecAdapter {
  constructor(private readonly cwd: string) {}

  async run(command: string, args: ReadonlyArray<string>, options: ExecOptions = {}): Promise<ExecResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: this.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => { stdoutChunks.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderrChunks.push(chunk); });

      child.on('close', (exitCode: number | null) => {
        resolve({
          // Killed by a signal (including the timeout): report as failure.
          exitCode: exitCode ?? 1,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        });
      });

      child.on('error', (err: Error) => { reject(err); });
    });
  }
}
