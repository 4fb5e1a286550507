#!/usr/bin/env -S npx tsx
import { runCli } from './src/adapters/cli/entry';
import { createPrettyConsoleLogger } from './src/infrastructure/logging/pretty-console-logger';

const main = async (): Promise<void> => {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}\n${error.stack ?? ''}` : String(error);

    createPrettyConsoleLogger({ level: 'error' }).error(message);

    process.exitCode = 2;
  }
};

void main();
