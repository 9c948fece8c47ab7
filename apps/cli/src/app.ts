import {
  decodeConfig,
  DEFAULT_PRESET,
  defaultPresetsPath,
  describeChecksum,
  encodeConfig,
  findRangeIssues,
  formatConfigDetails,
  formatHexDump,
  formatPresetList,
  loadPresets,
  parseHexBytes,
  resolvePreset,
  verifyChecksum,
  type ConfigurationSettings,
  type Logger,
  type PresetTable
} from '@gt911-config/engine';
import { readConfigFile, saveConfigFile } from './files.ts';
import { checkSystemRequirements, installConfig } from './installer.ts';
import { runInteractiveMenu } from './menu.ts';
import { HELP_LINES, parseOptions, type CliOptions } from './options.ts';
import { SudoRunner, type CommandExecutor } from './privilege.ts';
import { askYesNo, type Prompter } from './prompter.ts';

export interface AppDeps {
  logger: Logger;
  executor: CommandExecutor;
  createPrompter: () => Prompter;
  isRoot: boolean;
  delay?: (ms: number) => Promise<void>;
  tempRoot?: string;
}

export function resolveSettings(table: PresetTable, options: CliOptions, logger: Logger): ConfigurationSettings {
  const requested = options.preset ?? DEFAULT_PRESET;
  const resolved = resolvePreset(table, requested);
  if (resolved.fallback) {
    logger.warn(`Unknown preset '${requested}'. Using default values.`);
  }
  return { ...resolved.settings, ...options.overrides };
}

function printLines(logger: Logger, lines: string[]): void {
  for (const line of lines) logger.log(line);
}

function encodeForOutput(settings: ConfigurationSettings, options: CliOptions, logger: Logger): Uint8Array {
  if (options.strict) {
    const issues = findRangeIssues(settings);
    if (issues.length > 0) {
      throw new Error(`Settings rejected by --strict: ${issues.map(issue => issue.message).join('; ')}`);
    }
  }
  const blob = encodeConfig(settings);
  printLines(logger, formatConfigDetails(decodeConfig(blob)));
  if (options.dumpHex) printLines(logger, formatHexDump(blob));
  return blob;
}

function inspect(options: CliOptions, logger: Logger): number {
  const blob = options.inspectPath ? readConfigFile(options.inspectPath) : parseHexBytes(options.inspectHex ?? '');
  printLines(logger, formatConfigDetails(decodeConfig(blob)));
  if (options.dumpHex) printLines(logger, formatHexDump(blob));
  logger.log(describeChecksum(blob));
  return verifyChecksum(blob) ? 0 : 1;
}

/**
 * Entry point behind the `configure` script. Resolves with the process exit
 * code; argument, preset-file and codec errors are thrown to the caller.
 */
export async function runCli(argv: string[], deps: AppDeps): Promise<number> {
  const { logger } = deps;
  const options = parseOptions(argv);
  if (options.help) {
    printLines(logger, HELP_LINES);
    return 0;
  }

  if (options.mode === 'inspect') {
    return inspect(options, logger);
  }

  const presets = loadPresets(options.presetsFile ?? defaultPresetsPath(), logger);
  if (options.mode === 'presets') {
    printLines(logger, formatPresetList(presets));
    return 0;
  }

  const session: { prompter: Prompter | null } = { prompter: null };
  const getPrompter = (): Prompter => {
    session.prompter ??= deps.createPrompter();
    return session.prompter;
  };
  const sudo = new SudoRunner(deps.executor, () => getPrompter().askHidden('Enter sudo password: '), deps.isRoot);
  const install = (blob: Uint8Array): Promise<boolean> =>
    installConfig(
      blob,
      {
        executor: deps.executor,
        sudo,
        confirm: question => askYesNo(getPrompter(), question, logger),
        logger,
        delay: deps.delay,
        tempRoot: deps.tempRoot
      },
      { firmwareDir: options.firmwareDir, reload: options.reload }
    );

  try {
    const settings = resolveSettings(presets, options, logger);

    if (options.mode === 'generate') {
      const blob = encodeForOutput(settings, options, logger);
      return saveConfigFile(blob, options.outputPath, logger) ? 0 : 1;
    }

    if (options.mode === 'install') {
      const blob = encodeForOutput(settings, options, logger);
      const installed = await install(blob);
      logger.log(installed ? 'Installation completed.' : 'Installation failed.');
      return installed ? 0 : 1;
    }

    logger.log('GT911 Configuration Generator');
    logger.log('This utility generates and installs configuration files for GT911 controllers.');
    if (!deps.isRoot) {
      logger.log('Note: Some functions will require sudo privileges.');
      logger.log('You will be prompted for your password when needed.');
    }
    const requirements = await checkSystemRequirements(deps.executor, options.firmwareDir);
    if (!requirements.ok) {
      logger.warn(`Warning: ${requirements.message}`);
      logger.warn('Some features may not work correctly.');
    }

    await runInteractiveMenu({
      prompter: getPrompter(),
      logger,
      presets,
      settings,
      install,
      save: (blob, filename) => saveConfigFile(blob, filename, logger)
    });
    return 0;
  } finally {
    session.prompter?.close();
  }
}
