#!/usr/bin/env node
import { CLIParser } from './cli/CLIParser';
import { runCli } from './cli/App';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  await runCli(options);
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
