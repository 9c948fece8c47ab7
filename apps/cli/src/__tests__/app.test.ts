import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { BufferLengthError, bytesToHex, encodeConfig } from '@gt911-config/engine';
import { runCli, type AppDeps } from '../app.ts';
import { captureLogger, fakeExecutor, loggedLines, scriptedPrompter, type FakeExecutor } from './helpers.ts';

describe('runCli', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gt911-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function makeDeps(answers: string[] = [], executor: FakeExecutor = fakeExecutor()) {
    const logger = captureLogger();
    const prompter = scriptedPrompter(answers);
    const createPrompter = vi.fn(() => prompter);
    const deps: AppDeps = {
      logger,
      executor,
      createPrompter,
      isRoot: true,
      delay: async () => undefined,
      tempRoot: dir
    };
    return { deps, logger, prompter, createPrompter, executor };
  }

  it('prints help', async () => {
    const { deps, logger } = makeDeps();
    expect(await runCli(['--help'], deps)).toBe(0);
    expect(loggedLines(logger.log)[0]).toBe('Usage: npm run configure -- [mode] [options]');
  });

  it('lists presets', async () => {
    const { deps, logger } = makeDeps();
    expect(await runCli(['--list-presets'], deps)).toBe(0);
    const lines = loggedLines(logger.log);
    expect(lines[0]).toBe('Available Presets:');
    expect(lines).toContain('waveshare7:');
  });

  it('generates a file from a preset', async () => {
    const { deps, logger } = makeDeps();
    const output = path.join(dir, 'cfg.bin');

    expect(await runCli(['--generate', '--preset', '5inch', '--output', output], deps)).toBe(0);

    const bytes = fs.readFileSync(output);
    expect(bytes).toHaveLength(186);
    expect(bytes[184]).toBe(0xdb);
    expect(loggedLines(logger.log)).toContain(`Configuration saved to '${output}' successfully.`);
  });

  it('applies overrides with the encoder adjustments', async () => {
    const { deps } = makeDeps();
    const output = path.join(dir, 'cfg.bin');

    await runCli(['--generate', '--threshold', '300', '--touches', '0', '--output', output], deps);

    const bytes = fs.readFileSync(output);
    expect(bytes[12]).toBe(44);
    expect(bytes[5]).toBe(1);
  });

  it('rejects out-of-range settings under --strict', async () => {
    const { deps } = makeDeps();
    await expect(runCli(['--generate', '--strict', '--threshold', '300'], deps)).rejects.toThrow(
      'Settings rejected by --strict: touchThreshold out of range (300, expected 1-255)'
    );
  });

  it('warns and falls back for an unknown preset', async () => {
    const { deps, logger } = makeDeps();
    const output = path.join(dir, 'cfg.bin');
    await runCli(['--generate', '--preset', 'bogus', '--output', output], deps);
    expect(logger.warn).toHaveBeenCalledWith("Unknown preset 'bogus'. Using default values.");
    expect(fs.readFileSync(output)[184]).toBe(0x85);
  });

  it('dumps the image as hex on request', async () => {
    const { deps, logger } = makeDeps();
    await runCli(['--generate', '--dump-hex', '--output', path.join(dir, 'cfg.bin')], deps);
    expect(loggedLines(logger.log)).toContain('0x8047  01 00 04 58 02 05 00 00 03 04 00 00 10 00 00 00');
  });

  it('inspects a saved image', async () => {
    const { deps, logger } = makeDeps();
    const file = path.join(dir, 'cfg.bin');
    fs.writeFileSync(file, encodeConfig({ xMax: 1024, yMax: 600, touchThreshold: 16, touchPoints: 5, filterCoefficient: 4 }));

    expect(await runCli(['--inspect', file], deps)).toBe(0);
    const lines = loggedLines(logger.log);
    expect(lines).toContain(' Y_Resolution (0x804A..4B):' + ' '.repeat(6) + '600');
    expect(lines[lines.length - 1]).toBe('Checksum OK (0x85)');
  });

  it('fails the inspection of a tampered image', async () => {
    const { deps, logger } = makeDeps();
    const blob = encodeConfig({ xMax: 1024, yMax: 600, touchThreshold: 16, touchPoints: 5, filterCoefficient: 4 });
    blob[12] = 17;

    expect(await runCli(['--inspect-hex', bytesToHex(blob)], deps)).toBe(1);
    expect(loggedLines(logger.log)).toContain('Checksum MISMATCH (stored 0x85, computed 0x84)');
  });

  it('rejects hex of the wrong length', async () => {
    const { deps } = makeDeps();
    await expect(runCli(['--inspect-hex', '01 02 03'], deps)).rejects.toThrow(BufferLengthError);
  });

  it('installs without reloading when told not to', async () => {
    const { deps, logger, executor, createPrompter } = makeDeps();
    const firmwareDir = path.join(dir, 'firmware');
    fs.mkdirSync(firmwareDir);

    expect(await runCli(['--install', '--firmware-dir', firmwareDir, '--no-reload'], deps)).toBe(0);

    const commands = executor.calls.map(call => call.command);
    expect(commands).toEqual(['which', 'modprobe', 'cp', 'chmod']);
    expect(executor.calls[3].args).toEqual(['644', path.join(firmwareDir, 'goodix_911_cfg.bin')]);
    expect(loggedLines(logger.log)).toContain('Installation completed.');
    expect(createPrompter).not.toHaveBeenCalled();
  });

  it('asks before reloading and closes the prompter afterwards', async () => {
    const { deps, executor, prompter } = makeDeps(['y']);
    const firmwareDir = path.join(dir, 'firmware');
    fs.mkdirSync(firmwareDir);

    expect(await runCli(['--install', '--firmware-dir', firmwareDir], deps)).toBe(0);

    expect(prompter.questions).toEqual(['Would you like to reload the goodix driver? (y/N): ']);
    expect(executor.calls.slice(-2).map(call => [call.command, ...call.args])).toEqual([
      ['modprobe', '-r', 'goodix'],
      ['modprobe', 'goodix']
    ]);
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });

  it('keeps the menu running when an install step fails', async () => {
    const { deps, logger, prompter } = makeDeps(['8', '0']);
    deps.tempRoot = path.join(dir, 'missing');

    expect(await runCli(['--firmware-dir', dir], deps)).toBe(0);

    const lines = loggedLines(logger.log);
    expect(lines).toContain('Installation failed.');
    expect(lines[lines.length - 1]).toBe('Exiting configuration generator.');
    expect(prompter.questions.filter(question => question === '\nChoice: ')).toHaveLength(2);
  });

  it('runs the menu and warns about missing requirements', async () => {
    const executor = fakeExecutor(call => (call.command === 'which' ? { code: 1 } : {}));
    const { deps, logger, prompter } = makeDeps(['0'], executor);

    expect(await runCli(['--firmware-dir', dir], deps)).toBe(0);

    expect(logger.warn).toHaveBeenCalledWith('Warning: modprobe command not found');
    expect(loggedLines(logger.log)).toContain('Exiting configuration generator.');
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });
});
