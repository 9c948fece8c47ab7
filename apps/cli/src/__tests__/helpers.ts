import { vi } from 'vitest';
import type { CommandExecutor, CommandOutcome, ElevatedRunner, ExecResult } from '../privilege.ts';
import type { Prompter } from '../prompter.ts';

export function captureLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function loggedLines(mock: { mock: { calls: unknown[][] } }): string[] {
  return mock.mock.calls.map(call => String(call[0]));
}

export interface ScriptedPrompter extends Prompter {
  questions: string[];
  close: ReturnType<typeof vi.fn>;
}

/** Answers questions from the script in order, then reports end of input. */
export function scriptedPrompter(answers: string[]): ScriptedPrompter {
  const remaining = [...answers];
  const questions: string[] = [];
  const next = async (question: string): Promise<string | null> => {
    questions.push(question);
    return remaining.shift() ?? null;
  };
  return { questions, ask: next, askHidden: next, close: vi.fn() };
}

export interface ExecCall {
  command: string;
  args: string[];
  input?: string;
}

export interface FakeExecutor extends CommandExecutor {
  calls: ExecCall[];
}

export function fakeExecutor(
  respond: (call: ExecCall) => Partial<ExecResult> = () => ({})
): FakeExecutor {
  const calls: ExecCall[] = [];
  return {
    calls,
    async run(command, args, input) {
      const call = { command, args: [...args], input };
      calls.push(call);
      return { code: 0, stdout: '', stderr: '', ...respond(call) };
    }
  };
}

export interface FakeSudo extends ElevatedRunner {
  commands: string[][];
}

export function fakeSudo(respond: (command: string[]) => Partial<CommandOutcome> = () => ({})): FakeSudo {
  const commands: string[][] = [];
  return {
    commands,
    async run(command) {
      commands.push([...command]);
      return { ok: true, error: '', stdout: '', ...respond([...command]) };
    }
  };
}
