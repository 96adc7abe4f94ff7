// Command handlers behind the CLI; return the process exit code

import { InvalidArgumentError } from 'commander';
import * as readline from 'readline';
import { CollisionStrategy, FileErrorPolicy, LogLevel, OrganizerConfig } from '../types';
import {
  OrganizerConfigManager,
  isCollisionStrategy,
  isFileErrorPolicy,
  isLogLevel,
} from '../core/config-manager';
import { getErrorMessage } from '../core/errors';
import { FileLogger } from '../core/logger';
import { OrganizerOrchestrator } from '../core/organizer-orchestrator';

export interface CliOptions {
  collision?: CollisionStrategy;
  onError?: FileErrorPolicy;
  logFile?: string;
  logLevel?: LogLevel;
  verbose?: boolean;
}

export type Prompt = (question: string) => Promise<string>;

// Helper function to create readline interface and prompt user for input
export function promptUser(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function parseCollisionStrategy(value: string): CollisionStrategy {
  if (!isCollisionStrategy(value)) {
    throw new InvalidArgumentError('Expected "timestamp" or "number".');
  }
  return value;
}

export function parseFileErrorPolicy(value: string): FileErrorPolicy {
  if (!isFileErrorPolicy(value)) {
    throw new InvalidArgumentError('Expected "abort" or "skip".');
  }
  return value;
}

export function parseLogLevel(value: string): LogLevel {
  const level = value.toUpperCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError('Expected one of ERROR, WARN, INFO, DEBUG.');
  }
  return level;
}

/**
 * Defaults, then environment variables, then command-line options
 */
export function buildConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): OrganizerConfig {
  const config = OrganizerConfigManager.createFromEnv(env);

  return {
    ...config,
    collisionStrategy: options.collision ?? config.collisionStrategy,
    fileErrorPolicy: options.onError ?? config.fileErrorPolicy,
    logFilePath: options.logFile ?? config.logFilePath,
    logLevel: options.logLevel ?? config.logLevel,
  };
}

function createLogger(config: OrganizerConfig, options: CliOptions): FileLogger {
  return new FileLogger({
    level: config.logLevel,
    logFilePath: config.logFilePath,
    enableConsole: options.verbose === true,
  });
}

export async function runOrganizeCommand(
  directory: string | undefined,
  options: CliOptions,
  prompt: Prompt = promptUser
): Promise<number> {
  const config = buildConfig(options);
  const logger = createLogger(config, options);

  try {
    const sourceDir = directory ?? (await prompt('Enter the directory path to organize: '));
    if (sourceDir.trim().length === 0) {
      throw new Error('No directory path was given');
    }

    const orchestrator = new OrganizerOrchestrator(config, logger);
    const summary = await orchestrator.run(sourceDir.trim());

    console.log('\nOrganization complete!');
    console.log(`Processed ${summary.organizedCount} of ${summary.totalCount} files`);
    if (summary.failures.length > 0) {
      console.log(`${summary.failures.length} files could not be moved and were left in place:`);
      summary.failures.forEach((failure) => console.log(`  - ${failure.fileName}`));
    }
    console.log(
      `Check '${config.reportFileName}' in the ${config.organizedDirectoryName} directory for details`
    );
    console.log(`Check '${config.logFilePath}' for detailed operation logs`);
    return 0;
  } catch (error) {
    console.log(`An error occurred: ${getErrorMessage(error)}`);
    logger.error(`Program terminated with error: ${getErrorMessage(error)}`);
    return 1;
  }
}

export async function runReportCommand(directory: string, options: CliOptions): Promise<number> {
  const config = buildConfig(options);
  const logger = createLogger(config, options);

  try {
    const orchestrator = new OrganizerOrchestrator(config, logger);
    const report = await orchestrator.regenerateReport(directory);

    console.log(report.content);
    console.log(`\nReport written to ${report.reportPath}`);
    return 0;
  } catch (error) {
    console.log(`An error occurred: ${getErrorMessage(error)}`);
    logger.error(`Program terminated with error: ${getErrorMessage(error)}`);
    return 1;
  }
}
