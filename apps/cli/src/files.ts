import fs from 'node:fs';
import type { Logger } from '@gt911-config/engine';

export const DEFAULT_OUTPUT_FILE = 'goodix_911_cfg.bin';

export function saveConfigFile(blob: Uint8Array, filename: string = DEFAULT_OUTPUT_FILE, logger: Logger = console): boolean {
  try {
    fs.writeFileSync(filename, blob);
  } catch (error) {
    logger.error(`Error saving configuration: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
  logger.log(`Configuration saved to '${filename}' successfully.`);
  return true;
}

export function readConfigFile(filename: string): Uint8Array {
  return new Uint8Array(fs.readFileSync(filename));
}
