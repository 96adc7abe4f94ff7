#!/usr/bin/env node

// CLI entry point
import { Command, Option } from 'commander';
import {
  CliOptions,
  parseCollisionStrategy,
  parseFileErrorPolicy,
  parseLogLevel,
  runOrganizeCommand,
  runReportCommand,
} from './commands';

function addSharedOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--collision <strategy>', 'how to rename files whose name is taken: timestamp or number')
        .argParser(parseCollisionStrategy)
    )
    .addOption(
      new Option('--on-error <policy>', 'when a file cannot be moved: abort or skip')
        .argParser(parseFileErrorPolicy)
    )
    .option('--log-file <path>', 'log file to append to')
    .addOption(
      new Option('--log-level <level>', 'ERROR, WARN, INFO or DEBUG').argParser(parseLogLevel)
    )
    .option('-v, --verbose', 'also print log lines to the console');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('file-organizer')
    .description('Sort the files of a directory into category folders by extension')
    .version('1.0.0')
    .enablePositionalOptions();

  addSharedOptions(program)
    .argument('[directory]', 'directory to organize (prompted for when omitted)')
    .action(async (directory: string | undefined, options: CliOptions) => {
      process.exitCode = await runOrganizeCommand(directory, options);
    });

  addSharedOptions(program.command('report'))
    .description('Rewrite the report of an already organized directory')
    .argument('<directory>', 'directory that was organized')
    .action(async (directory: string, options: CliOptions) => {
      process.exitCode = await runReportCommand(directory, options);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}
