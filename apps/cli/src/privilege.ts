import { spawn } from 'node:child_process';

export interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandExecutor {
  run(command: string, args: readonly string[], input?: string): Promise<ExecResult>;
}

export interface CommandOutcome {
  ok: boolean;
  error: string;
  stdout: string;
}

/** Anything that can run a command with root privileges. */
export interface ElevatedRunner {
  run(command: readonly string[]): Promise<CommandOutcome>;
}

export type PasswordPrompt = () => Promise<string | null>;

export const PASSWORD_REQUIRED_ERROR = 'Sudo password required but not provided';

// Spawn failures (missing binary, EACCES) come back as a null exit code, never as a rejection.
export function createSpawnExecutor(): CommandExecutor {
  return {
    run(command, args, input) {
      return new Promise(resolve => {
        let stdout = '';
        let stderr = '';
        const child = spawn(command, [...args]);
        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk;
        });
        child.stderr.on('data', (chunk: string) => {
          stderr += chunk;
        });
        child.on('error', error => {
          resolve({ code: null, stdout, stderr: stderr || error.message });
        });
        child.on('close', code => {
          resolve({ code, stdout, stderr });
        });
        child.stdin.end(input ?? '');
      });
    }
  };
}

function toOutcome(result: ExecResult): CommandOutcome {
  return {
    ok: result.code === 0,
    error: result.code === 0 ? '' : result.stderr.trim() || `exit code ${result.code ?? 'unknown'}`,
    stdout: result.stdout.trim()
  };
}

/**
 * Runs commands through sudo. Uses cached credentials when `sudo -n true`
 * succeeds, otherwise prompts once for a password and feeds it to `sudo -S`.
 * A failed `sudo -S` run forgets the password so the next call asks again.
 */
export class SudoRunner implements ElevatedRunner {
  private readonly executor: CommandExecutor;
  private readonly askPassword: PasswordPrompt;
  private readonly isRoot: boolean;
  private password: string | null = null;

  constructor(executor: CommandExecutor, askPassword: PasswordPrompt, isRoot = false) {
    this.executor = executor;
    this.askPassword = askPassword;
    this.isRoot = isRoot;
  }

  async run(command: readonly string[]): Promise<CommandOutcome> {
    const [program, ...args] = command;
    if (!program) throw new Error('SudoRunner.run requires a command');

    if (this.isRoot) {
      return toOutcome(await this.executor.run(program, args));
    }

    if (await this.hasCachedCredentials()) {
      return toOutcome(await this.executor.run('sudo', command));
    }

    const password = await this.getPassword();
    if (password === null) {
      return { ok: false, error: PASSWORD_REQUIRED_ERROR, stdout: '' };
    }

    const result = await this.executor.run('sudo', ['-S', ...command], `${password}\n`);
    if (result.code !== 0) {
      this.password = null;
    }
    return toOutcome(result);
  }

  private async hasCachedCredentials(): Promise<boolean> {
    const probe = await this.executor.run('sudo', ['-n', 'true']);
    return probe.code === 0;
  }

  private async getPassword(): Promise<string | null> {
    if (this.password === null) {
      this.password = await this.askPassword();
    }
    return this.password;
  }
}
