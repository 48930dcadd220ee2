import { describe, expect, it } from 'vitest';

import { describeFailure, ExecFileCommandRunner, type CommandFailure } from './command-runner.js';

const failure = (overrides: Partial<CommandFailure>): CommandFailure => ({
  kind: 'exit',
  exitCode: 1,
  message: 'Command failed',
  stdout: '',
  stderr: '',
  ...overrides,
});

describe('describeFailure', () => {
  it('reports the exit code', () => {
    expect(describeFailure(failure({ exitCode: 5 }))).toBe('exited with code 5');
    expect(describeFailure(failure({ exitCode: null }))).toBe('exited with code unknown');
  });

  it('names timeouts and cancellations', () => {
    expect(describeFailure(failure({ kind: 'timeout' }))).toBe('timed out');
    expect(describeFailure(failure({ kind: 'aborted' }))).toBe('aborted');
  });

  it('passes spawn errors through', () => {
    expect(describeFailure(failure({ kind: 'spawn', message: 'spawn hciconfig ENOENT' }))).toBe(
      'spawn hciconfig ENOENT',
    );
  });
});

describe('ExecFileCommandRunner', () => {
  const runner = new ExecFileCommandRunner();

  it('returns output of a successful command', async () => {
    const result = await runner.run('sh', ['-c', 'echo AA:BB:CC:DD:EE:FF']);

    expect(result).toEqual({ ok: true, value: { stdout: 'AA:BB:CC:DD:EE:FF\n', stderr: '' } });
  });

  it('classifies a non-zero exit and keeps its output', async () => {
    const result = await runner.run('sh', ['-c', 'echo AA:BB:CC:DD:EE:FF; exit 3']);

    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'exit', exitCode: 3, stdout: 'AA:BB:CC:DD:EE:FF\n' },
    });
  });

  it('classifies a command killed by its timeout', async () => {
    const result = await runner.run('sleep', ['5'], { timeoutMs: 100 });

    expect(result).toMatchObject({ ok: false, error: { kind: 'timeout', exitCode: null } });
  });

  it('classifies a command cancelled through its signal', async () => {
    const controller = new AbortController();
    const pending = runner.run('sleep', ['5'], { signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    expect(await pending).toMatchObject({ ok: false, error: { kind: 'aborted', exitCode: null } });
  });

  it('classifies a missing binary as a spawn failure', async () => {
    const result = await runner.run('vampgotchi-no-such-binary', []);

    expect(result).toMatchObject({ ok: false, error: { kind: 'spawn', exitCode: null } });
  });
});
