import { runCli } from './app.ts';
import { createSpawnExecutor } from './privilege.ts';
import { createReadlinePrompter } from './prompter.ts';

async function run(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    logger: console,
    executor: createSpawnExecutor(),
    createPrompter: () => createReadlinePrompter(),
    isRoot: typeof process.getuid === 'function' && process.getuid() === 0
  });
}

run().catch(error => {
  console.error(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exitCode = 1;
});
