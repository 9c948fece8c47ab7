import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { findBlobProblems, type Logger } from '@gt911-config/engine';
import { DEFAULT_OUTPUT_FILE } from './files.ts';
import type { CommandExecutor, ElevatedRunner } from './privilege.ts';

export const DEFAULT_FIRMWARE_DIR = '/lib/firmware';
export const FIRMWARE_FILE_NAME = DEFAULT_OUTPUT_FILE;
export const DRIVER_MODULE = 'goodix';
export const RELOAD_SETTLE_MS = 1000;

export type ReloadPolicy = 'ask' | 'yes' | 'no';

export interface RequirementCheck {
  ok: boolean;
  message: string;
}

export interface InstallDeps {
  executor: CommandExecutor;
  sudo: ElevatedRunner;
  confirm: (question: string) => Promise<boolean>;
  logger?: Logger;
  delay?: (ms: number) => Promise<void>;
  tempRoot?: string;
}

export interface InstallOptions {
  firmwareDir: string;
  reload: ReloadPolicy;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/**
 * The firmware directory must exist, modprobe must be on the PATH and
 * the goodix module must be known to it. Stops at the first failure.
 */
export async function checkSystemRequirements(
  executor: CommandExecutor,
  firmwareDir: string = DEFAULT_FIRMWARE_DIR
): Promise<RequirementCheck> {
  if (!isDirectory(firmwareDir)) {
    return { ok: false, message: `Directory ${firmwareDir} does not exist` };
  }
  const which = await executor.run('which', ['modprobe']);
  if (which.code !== 0) {
    return { ok: false, message: 'modprobe command not found' };
  }
  const dryRun = await executor.run('modprobe', ['-n', DRIVER_MODULE]);
  if (dryRun.code !== 0) {
    return { ok: false, message: 'Goodix driver module not available' };
  }
  return { ok: true, message: 'System requirements met' };
}

async function reloadDriver(sudo: ElevatedRunner, delay: (ms: number) => Promise<void>, logger: Logger): Promise<boolean> {
  logger.log('[INFO] Reloading driver...');
  const unload = await sudo.run(['modprobe', '-r', DRIVER_MODULE]);
  if (!unload.ok) {
    logger.error(`Error unloading driver: ${unload.error}`);
    return false;
  }

  await delay(RELOAD_SETTLE_MS);

  const load = await sudo.run(['modprobe', DRIVER_MODULE]);
  if (!load.ok) {
    logger.error(`Error loading driver: ${load.error}`);
    return false;
  }

  logger.log('Driver reloaded. Please check dmesg for results:');
  logger.log('Command: dmesg | grep Goodix');
  return true;
}

async function copyIntoFirmwareDir(
  blob: Uint8Array,
  sudo: ElevatedRunner,
  target: string,
  tempRoot: string,
  logger: Logger
): Promise<boolean> {
  let tempDir: string;
  try {
    tempDir = fs.mkdtempSync(path.join(tempRoot, 'gt911-'));
  } catch (error) {
    logger.error(`Error writing temporary file: ${errorMessage(error)}`);
    return false;
  }
  const tempFile = path.join(tempDir, FIRMWARE_FILE_NAME);
  try {
    try {
      fs.writeFileSync(tempFile, blob);
    } catch (error) {
      logger.error(`Error writing temporary file: ${errorMessage(error)}`);
      return false;
    }

    const copy = await sudo.run(['cp', tempFile, target]);
    if (!copy.ok) {
      logger.error(`Error copying file: ${copy.error}`);
      return false;
    }

    const chmod = await sudo.run(['chmod', '644', target]);
    if (!chmod.ok) {
      logger.error(`Error setting permissions: ${chmod.error}`);
      return false;
    }
    return true;
  } finally {
    try {
      fs.rmSync(tempDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(`[WARN] Could not remove temporary file ${tempFile}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Copies a finished image to `<firmwareDir>/goodix_911_cfg.bin` as root and
 * optionally reloads the goodix module. Returns false on the first failed step.
 */
export async function installConfig(blob: Uint8Array, deps: InstallDeps, options: InstallOptions): Promise<boolean> {
  const logger = deps.logger ?? console;
  const problems = findBlobProblems(blob);
  if (problems.length > 0) {
    logger.error(`Refusing to install configuration: ${problems.join('; ')}`);
    return false;
  }

  const requirements = await checkSystemRequirements(deps.executor, options.firmwareDir);
  if (!requirements.ok) {
    logger.error(`System requirements not met: ${requirements.message}`);
    return false;
  }

  const target = path.join(options.firmwareDir, FIRMWARE_FILE_NAME);
  const copied = await copyIntoFirmwareDir(blob, deps.sudo, target, deps.tempRoot ?? os.tmpdir(), logger);
  if (!copied) return false;
  logger.log(`[INFO] Configuration installed to ${target}`);

  let reload = options.reload === 'yes';
  if (options.reload === 'ask') {
    reload = await deps.confirm(`Would you like to reload the ${DRIVER_MODULE} driver? (y/N): `);
  }
  if (!reload) {
    logger.log('[INFO] Driver not reloaded. Changes will take effect after reboot.');
    return true;
  }

  return reloadDriver(deps.sudo, deps.delay ?? sleep, logger);
}
