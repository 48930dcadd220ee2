import { execFile, type ExecFileException } from 'child_process';

import { err, ok, type Result } from '@vampgotchi/common';

export interface CommandOptions {
  /** Working directory of the child; the server's own cwd is never changed. */
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandFailureKind = 'exit' | 'timeout' | 'aborted' | 'spawn';

export interface CommandFailure extends CommandOutput {
  kind: CommandFailureKind;
  exitCode: number | null;
  message: string;
}

export type CommandResult = Result<CommandOutput, CommandFailure>;

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

const MAX_BUFFER = 4 * 1024 * 1024;

const classify = (error: ExecFileException, options: CommandOptions): CommandFailureKind => {
  if (options.signal?.aborted || error.name === 'AbortError') return 'aborted';
  if (typeof error.code === 'string') return 'spawn';
  if (error.killed && options.timeoutMs !== undefined) return 'timeout';
  return 'exit';
};

export class ExecFileCommandRunner implements CommandRunner {
  run(file: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve) => {
      execFile(
        file,
        args,
        {
          cwd: options.cwd,
          timeout: options.timeoutMs,
          signal: options.signal,
          maxBuffer: MAX_BUFFER,
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve(ok({ stdout, stderr }));
            return;
          }
          resolve(
            err({
              kind: classify(error, options),
              exitCode: typeof error.code === 'number' ? error.code : null,
              message: error.message,
              stdout,
              stderr,
            }),
          );
        },
      );
    });
  }
}

export const describeFailure = (failure: CommandFailure) => {
  switch (failure.kind) {
    case 'timeout':
      return 'timed out';
    case 'aborted':
      return 'aborted';
    case 'spawn':
      return failure.message;
    case 'exit':
      return `exited with code ${failure.exitCode ?? 'unknown'}`;
  }
};
