import { describe, it, expect, vi } from 'vitest';
import { createSpawnExecutor, PASSWORD_REQUIRED_ERROR, SudoRunner } from '../privilege.ts';
import { fakeExecutor } from './helpers.ts';

describe('SudoRunner', () => {
  it('runs commands directly when already root', async () => {
    const executor = fakeExecutor();
    const askPassword = vi.fn();
    const runner = new SudoRunner(executor, askPassword, true);

    const outcome = await runner.run(['cp', 'a.bin', '/lib/firmware/a.bin']);

    expect(outcome).toEqual({ ok: true, error: '', stdout: '' });
    expect(executor.calls).toEqual([{ command: 'cp', args: ['a.bin', '/lib/firmware/a.bin'], input: undefined }]);
    expect(askPassword).not.toHaveBeenCalled();
  });

  it('uses cached sudo credentials without prompting', async () => {
    const executor = fakeExecutor();
    const askPassword = vi.fn();
    const runner = new SudoRunner(executor, askPassword);

    await runner.run(['chmod', '644', '/lib/firmware/a.bin']);

    expect(executor.calls.map(call => [call.command, ...call.args])).toEqual([
      ['sudo', '-n', 'true'],
      ['sudo', 'chmod', '644', '/lib/firmware/a.bin']
    ]);
    expect(askPassword).not.toHaveBeenCalled();
  });

  it('prompts once and feeds the password to sudo -S', async () => {
    const executor = fakeExecutor(call => (call.args[0] === '-n' ? { code: 1 } : {}));
    const askPassword = vi.fn(async () => 'test-secret');
    const runner = new SudoRunner(executor, askPassword);

    await runner.run(['modprobe', '-r', 'goodix']);
    await runner.run(['modprobe', 'goodix']);

    expect(askPassword).toHaveBeenCalledTimes(1);
    const elevated = executor.calls.filter(call => call.args[0] === '-S');
    expect(elevated).toEqual([
      { command: 'sudo', args: ['-S', 'modprobe', '-r', 'goodix'], input: 'test-secret\n' },
      { command: 'sudo', args: ['-S', 'modprobe', 'goodix'], input: 'test-secret\n' }
    ]);
  });

  it('forgets the password after a failed run', async () => {
    const executor = fakeExecutor(call => {
      if (call.args[0] === '-n') return { code: 1 };
      return { code: 1, stderr: 'Sorry, try again.\n' };
    });
    const askPassword = vi.fn(async () => 'wrong-secret');
    const runner = new SudoRunner(executor, askPassword);

    const outcome = await runner.run(['cp', 'a', 'b']);
    await runner.run(['cp', 'a', 'b']);

    expect(outcome).toEqual({ ok: false, error: 'Sorry, try again.', stdout: '' });
    expect(askPassword).toHaveBeenCalledTimes(2);
  });

  it('fails without running anything when no password is given', async () => {
    const executor = fakeExecutor(() => ({ code: 1 }));
    const runner = new SudoRunner(executor, async () => null);

    const outcome = await runner.run(['cp', 'a', 'b']);

    expect(outcome).toEqual({ ok: false, error: PASSWORD_REQUIRED_ERROR, stdout: '' });
    expect(executor.calls).toHaveLength(1);
  });

  it('reports the exit code when a command fails silently', async () => {
    const executor = fakeExecutor(call => (call.command === 'modprobe' ? { code: 2 } : {}));
    const runner = new SudoRunner(executor, async () => null, true);

    expect(await runner.run(['modprobe', 'goodix'])).toEqual({ ok: false, error: 'exit code 2', stdout: '' });
  });

  it('refuses an empty command', async () => {
    const runner = new SudoRunner(fakeExecutor(), async () => null, true);
    await expect(runner.run([])).rejects.toThrow('SudoRunner.run requires a command');
  });
});

describe('createSpawnExecutor', () => {
  const executor = createSpawnExecutor();

  it('collects output and the exit code', async () => {
    const script = [
      "let text = '';",
      "process.stdin.setEncoding('utf8');",
      "process.stdin.on('data', chunk => { text += chunk; });",
      "process.stdin.on('end', () => {",
      "  process.stdout.write(text.toUpperCase());",
      "  process.stderr.write('done');",
      '  process.exitCode = 3;',
      '});'
    ].join('\n');

    const result = await executor.run(process.execPath, ['-e', script], 'test-secret\n');

    expect(result).toEqual({ code: 3, stdout: 'TEST-SECRET\n', stderr: 'done' });
  });

  it('closes stdin when there is no input', async () => {
    const script = "process.stdin.resume(); process.stdin.on('end', () => process.stdout.write('ok'));";
    expect(await executor.run(process.execPath, ['-e', script])).toEqual({ code: 0, stdout: 'ok', stderr: '' });
  });

  it('resolves a missing binary with a null exit code', async () => {
    const result = await executor.run('gt911-missing-binary', ['-n'], 'test-secret\n');
    expect(result).toEqual({ code: null, stdout: '', stderr: 'spawn gt911-missing-binary ENOENT' });
  });
});
