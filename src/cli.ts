#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handlePickCommand } from './cli/pick-command.js';
import { CliUsageError } from './cli/errors.js';

const VERSION = '0.1.0';

function optionArgs(args: readonly string[]): readonly string[] {
  const separator = args.indexOf('--');
  return separator >= 0 ? args.slice(0, separator) : args;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const options = optionArgs(args);

  if (options.includes('--help') || options.includes('-h')) {
    printHelp();
    return;
  }
  if (options.includes('--version') || options.includes('-v') || options.includes('-V')) {
    printVersion(VERSION);
    return;
  }

  try {
    const exitCode = await handlePickCommand(args);
    // stdin may still be open when the producer outlives the selection.
    process.exit(exitCode);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
