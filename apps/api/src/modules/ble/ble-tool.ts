import { mapResult, type Result } from '@vampgotchi/common';

import type { CommandFailure, CommandOutput, CommandRunner } from '../../shared/system/command-runner.js';

/** Tool output with stdout and stderr joined; devices show up on either stream. */
export type BleToolResult = Result<string, CommandFailure>;

export interface BleTool {
  scan(): Promise<BleToolResult>;
  deauth(mac: string, timeoutSeconds: number, signal: AbortSignal): Promise<BleToolResult>;
  adapterStatus(): Promise<BleToolResult>;
}

export interface BleedingCliToolOptions {
  python: string;
  script: string;
  /** Directory the tool runs from; read on every call so preference changes apply. */
  toolPath: () => string;
  scanTimeoutMs: number;
}

/** Grace period on top of the tool's own `--timeout` before the child is killed. */
export const DEAUTH_GRACE_MS = 15_000;
const ADAPTER_STATUS_TIMEOUT_MS = 5_000;

const joinOutput = ({ stdout, stderr }: CommandOutput) => (stderr ? `${stdout}${stderr}` : stdout);

export class BleedingCliTool implements BleTool {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: BleedingCliToolOptions,
  ) {}

  async scan(): Promise<BleToolResult> {
    const result = await this.runner.run(this.options.python, [this.options.script, 'scan', '--ble', '--headless'], {
      cwd: this.options.toolPath(),
      timeoutMs: this.options.scanTimeoutMs,
    });
    return mapResult(result, joinOutput);
  }

  async deauth(mac: string, timeoutSeconds: number, signal: AbortSignal): Promise<BleToolResult> {
    const result = await this.runner.run(
      this.options.python,
      [this.options.script, 'deauth', mac, '--ble', '--timeout', String(timeoutSeconds)],
      {
        cwd: this.options.toolPath(),
        timeoutMs: timeoutSeconds * 1000 + DEAUTH_GRACE_MS,
        signal,
      },
    );
    return mapResult(result, joinOutput);
  }

  async adapterStatus(): Promise<BleToolResult> {
    const result = await this.runner.run('hciconfig', [], { timeoutMs: ADAPTER_STATUS_TIMEOUT_MS });
    return mapResult(result, joinOutput);
  }
}
