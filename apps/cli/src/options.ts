import type { ConfigurationSettings } from '@gt911-config/engine';
import { DEFAULT_OUTPUT_FILE } from './files.ts';
import { DEFAULT_FIRMWARE_DIR, type ReloadPolicy } from './installer.ts';

export type RunMode = 'interactive' | 'generate' | 'install' | 'inspect' | 'presets';

export interface CliOptions {
  mode: RunMode;
  help: boolean;
  preset?: string;
  overrides: Partial<ConfigurationSettings>;
  outputPath: string;
  inspectPath?: string;
  inspectHex?: string;
  firmwareDir: string;
  presetsFile?: string;
  reload: ReloadPolicy;
  strict: boolean;
  dumpHex: boolean;
}

const SETTING_FLAGS: Record<string, keyof ConfigurationSettings> = {
  '--x-max': 'xMax',
  '--y-max': 'yMax',
  '--threshold': 'touchThreshold',
  '--touches': 'touchPoints',
  '--filter': 'filterCoefficient'
};

export const HELP_LINES = [
  'Usage: npm run configure -- [mode] [options]',
  '',
  'Modes (pick one):',
  '  --interactive                Numbered menu (default)',
  '  --generate                   Encode the settings and save them to --output',
  '  --install                    Encode the settings and install them into --firmware-dir',
  '  --inspect <file>             Decode an existing configuration image',
  '  --inspect-hex <hex>          Decode an image given as hex text',
  '  --list-presets               Show the preset table',
  '',
  'Settings (applied on top of --preset, default 7inch):',
  '  --preset <name>              7inch | 5inch | waveshare7 | any name in --presets-file',
  '  --x-max <n>                  X resolution, even, 2-4094',
  '  --y-max <n>                  Y resolution, even, 2-4094',
  '  --threshold <n>              Screen touch level, 1-255',
  '  --touches <n>                Number of touch points, 1-10',
  '  --filter <n>                 Filter coefficient, 0-15',
  '',
  'Options:',
  `  --output <file>              Default: ${DEFAULT_OUTPUT_FILE}`,
  `  --firmware-dir <dir>         Default: ${DEFAULT_FIRMWARE_DIR}`,
  '  --presets-file <file>        Load presets from a JSON file',
  '  --reload | --no-reload       Reload the goodix driver after install without asking',
  '  --strict                     Reject settings outside the ranges above instead of clamping',
  '  --dump-hex                   Print the image as a register hex dump',
  '  --help                       Show this help'
];

function parseIntegerFlag(flag: string, text: string): number {
  if (!/^-?\d+$/.test(text.trim())) {
    throw new Error(`Invalid ${flag}: ${text}`);
  }
  return Number.parseInt(text, 10);
}

function pickMode(current: RunMode | null, next: RunMode): RunMode {
  if (current && current !== next) {
    throw new Error('Choose only one mode: --interactive, --generate, --install, --inspect, --inspect-hex or --list-presets');
  }
  return next;
}

export function parseOptions(argv: string[]): CliOptions {
  let mode: RunMode | null = null;
  let preset: string | undefined;
  const overrides: Partial<ConfigurationSettings> = {};
  let outputPath = DEFAULT_OUTPUT_FILE;
  let inspectPath: string | undefined;
  let inspectHex: string | undefined;
  let firmwareDir = DEFAULT_FIRMWARE_DIR;
  let presetsFile: string | undefined;
  let reload: ReloadPolicy = 'ask';
  let strict = false;
  let dumpHex = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (arg === '--help' || arg === '-h') {
      return {
        mode: mode ?? 'interactive',
        help: true,
        overrides,
        outputPath,
        firmwareDir,
        reload,
        strict,
        dumpHex
      };
    }

    const settingField = Object.hasOwn(SETTING_FLAGS, arg) ? SETTING_FLAGS[arg] : undefined;
    if (settingField) {
      const next = argv[index + 1];
      if (!next) throw new Error(`${arg} requires a number`);
      index += 1;
      overrides[settingField] = parseIntegerFlag(arg, next);
      continue;
    }

    if (arg === '--interactive' || arg === '--generate' || arg === '--install') {
      mode = pickMode(mode, arg === '--interactive' ? 'interactive' : arg === '--generate' ? 'generate' : 'install');
      continue;
    }

    if (arg === '--list-presets') {
      mode = pickMode(mode, 'presets');
      continue;
    }

    if (arg === '--inspect') {
      const next = argv[index + 1];
      if (!next) throw new Error('--inspect requires a file path');
      index += 1;
      mode = pickMode(mode, 'inspect');
      inspectPath = next;
      continue;
    }

    if (arg === '--inspect-hex') {
      const next = argv[index + 1];
      if (!next) throw new Error('--inspect-hex requires hex bytes');
      index += 1;
      mode = pickMode(mode, 'inspect');
      inspectHex = next;
      continue;
    }

    if (arg === '--preset') {
      const next = argv[index + 1];
      if (!next) throw new Error('--preset requires a name');
      index += 1;
      preset = next;
      continue;
    }

    if (arg === '--output') {
      const next = argv[index + 1];
      if (!next) throw new Error('--output requires a file path');
      index += 1;
      outputPath = next;
      continue;
    }

    if (arg === '--firmware-dir') {
      const next = argv[index + 1];
      if (!next) throw new Error('--firmware-dir requires a directory');
      index += 1;
      firmwareDir = next;
      continue;
    }

    if (arg === '--presets-file') {
      const next = argv[index + 1];
      if (!next) throw new Error('--presets-file requires a file path');
      index += 1;
      presetsFile = next;
      continue;
    }

    if (arg === '--reload') {
      reload = 'yes';
      continue;
    }

    if (arg === '--no-reload') {
      reload = 'no';
      continue;
    }

    if (arg === '--strict') {
      strict = true;
      continue;
    }

    if (arg === '--dump-hex') {
      dumpHex = true;
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  if (inspectPath && inspectHex) {
    throw new Error('Use either --inspect or --inspect-hex, not both');
  }

  return {
    mode: mode ?? 'interactive',
    help: false,
    preset,
    overrides,
    outputPath,
    inspectPath,
    inspectHex,
    firmwareDir,
    presetsFile,
    reload,
    strict,
    dumpHex
  };
}
