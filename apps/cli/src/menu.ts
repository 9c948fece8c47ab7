import {
  BufferLengthError,
  decodeConfig,
  describeChecksum,
  encodeConfig,
  formatConfigDetails,
  formatPresetList,
  INPUT_RANGES,
  resolvePreset,
  ValidationError,
  type ConfigurationSettings,
  type InputRange,
  type Logger,
  type PresetTable
} from '@gt911-config/engine';
import { DEFAULT_OUTPUT_FILE, saveConfigFile } from './files.ts';
import type { Prompter } from './prompter.ts';

export interface MenuContext {
  prompter: Prompter;
  logger: Logger;
  presets: PresetTable;
  settings: ConfigurationSettings;
  install: (blob: Uint8Array) => Promise<boolean>;
  save?: (blob: Uint8Array, filename: string) => boolean;
}

const ACTION_LINES = [
  '',
  'ACTIONS:',
  '  5) Show Available Presets',
  '  6) Load Preset',
  '  7) Generate and Save Configuration',
  '  8) Generate and Install Configuration',
  '  9) Show Detailed Configuration',
  '  0) Exit',
  '',
  'Enter a number to modify setting or perform action'
];

/**
 * Asks until the answer is an integer inside the range. An empty answer keeps
 * the current value; null means input ended.
 */
export async function promptNumber(
  prompter: Prompter,
  logger: Logger,
  label: string,
  range: InputRange,
  current: number
): Promise<number | null> {
  for (;;) {
    const answer = await prompter.ask(`${label} (${range.min}-${range.max}) [${current}]: `);
    if (answer === null) return null;
    const text = answer.trim();
    if (!text) return current;
    if (!/^-?\d+$/.test(text)) {
      logger.log('Please enter a valid number');
      continue;
    }
    const value = Number.parseInt(text, 10);
    if (value >= range.min && value <= range.max) return value;
    logger.log(`Value must be between ${range.min} and ${range.max}`);
  }
}

function printSettings(logger: Logger, settings: ConfigurationSettings): void {
  logger.log('');
  logger.log('=== GT911 Configuration Generator ===');
  logger.log('');
  logger.log('CURRENT SETTINGS:');
  logger.log(`  1) Resolution:         ${settings.xMax}x${settings.yMax}`);
  logger.log(`  2) Touch Threshold:    ${settings.touchThreshold}`);
  logger.log(`  3) Number of Touches:  ${settings.touchPoints}`);
  logger.log(`  4) Filter Coefficient: ${settings.filterCoefficient}`);
  for (const line of ACTION_LINES) logger.log(line);
}

type StepResult = 'continue' | 'exit';

async function runChoice(choice: string, context: MenuContext, settings: ConfigurationSettings): Promise<StepResult> {
  const { prompter, logger } = context;

  switch (choice) {
    case '1': {
      const xMax = await promptNumber(prompter, logger, 'X Resolution', INPUT_RANGES.xMax, settings.xMax);
      if (xMax === null) return 'exit';
      settings.xMax = xMax;
      const yMax = await promptNumber(prompter, logger, 'Y Resolution', INPUT_RANGES.yMax, settings.yMax);
      if (yMax === null) return 'exit';
      settings.yMax = yMax;
      return 'continue';
    }
    case '2': {
      const value = await promptNumber(prompter, logger, 'Touch Threshold', INPUT_RANGES.touchThreshold, settings.touchThreshold);
      if (value === null) return 'exit';
      settings.touchThreshold = value;
      return 'continue';
    }
    case '3': {
      const value = await promptNumber(prompter, logger, 'Number of Touch Points', INPUT_RANGES.touchPoints, settings.touchPoints);
      if (value === null) return 'exit';
      settings.touchPoints = value;
      return 'continue';
    }
    case '4': {
      const value = await promptNumber(
        prompter,
        logger,
        'Filter Coefficient',
        INPUT_RANGES.filterCoefficient,
        settings.filterCoefficient
      );
      if (value === null) return 'exit';
      settings.filterCoefficient = value;
      return 'continue';
    }
    case '5':
      logger.log('');
      for (const line of formatPresetList(context.presets)) logger.log(line);
      return 'continue';
    case '6': {
      logger.log('');
      for (const line of formatPresetList(context.presets)) logger.log(line);
      const name = await prompter.ask('\nEnter preset name: ');
      if (name === null) return 'exit';
      const resolved = resolvePreset(context.presets, name);
      if (resolved.fallback) {
        logger.log(`Unknown preset '${name.trim()}'. Using default values.`);
      }
      Object.assign(settings, resolved.settings);
      return 'continue';
    }
    case '7': {
      const blob = encodeConfig(settings);
      const answer = await prompter.ask(`Enter filename [${DEFAULT_OUTPUT_FILE}]: `);
      if (answer === null) return 'exit';
      const filename = answer.trim() || DEFAULT_OUTPUT_FILE;
      const save = context.save ?? ((bytes: Uint8Array, file: string) => saveConfigFile(bytes, file, logger));
      save(blob, filename);
      return 'continue';
    }
    case '8': {
      const blob = encodeConfig(settings);
      logger.log('');
      logger.log('Generating and installing configuration...');
      const installed = await context.install(blob);
      logger.log(installed ? 'Installation completed.' : 'Installation failed.');
      return 'continue';
    }
    case '9': {
      const blob = encodeConfig(settings);
      logger.log('');
      for (const line of formatConfigDetails(decodeConfig(blob))) logger.log(line);
      logger.log(describeChecksum(blob));
      return 'continue';
    }
    case '0':
      logger.log('');
      logger.log('Exiting configuration generator.');
      return 'exit';
    default:
      logger.log('');
      logger.log('Invalid choice. Please try again.');
      return 'continue';
  }
}

/** Runs the numbered menu until 0 or end of input; resolves with the final settings. */
export async function runInteractiveMenu(context: MenuContext): Promise<ConfigurationSettings> {
  const settings: ConfigurationSettings = { ...context.settings };

  for (;;) {
    printSettings(context.logger, settings);
    const choice = await context.prompter.ask('\nChoice: ');
    if (choice === null) return settings;

    try {
      const step = await runChoice(choice.trim(), context, settings);
      if (step === 'exit') return settings;
    } catch (error) {
      if (error instanceof ValidationError || error instanceof BufferLengthError) {
        context.logger.log('');
        context.logger.log(`Error: ${error.message}`);
        continue;
      }
      throw error;
    }
  }
}
