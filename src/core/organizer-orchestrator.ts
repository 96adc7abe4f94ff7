// Coordinates one organizer run: organize, report, summarize

import { v4 as uuidv4 } from 'uuid';
import * as path from 'path';
import { Logger, OrganizerConfig, RunSummary } from '../types';
import { OrganizerConfigManager } from './config-manager';
import { ErrorHandler } from './error-handler';
import { CategoryClassifier } from '../services/local/category-classifier';
import { FileOrganizer } from '../services/local/file-organizer';
import { FileMover } from '../services/local/types';
import { OrganizationReport, OrganizationReporter } from '../progress/organization-reporter';

export interface OrchestratorDependencies {
  mover?: FileMover;
  now?: () => Date;
}

export class OrganizerOrchestrator {
  private readonly logger: Logger;
  private readonly errorHandler: ErrorHandler;
  private readonly organizer: FileOrganizer;
  private readonly reporter: OrganizationReporter;

  constructor(config: OrganizerConfig, logger: Logger, dependencies: OrchestratorDependencies = {}) {
    const validation = OrganizerConfigManager.validateConfig(config);
    if (!validation.isValid) {
      throw new Error(`Invalid configuration: ${validation.errors.join(', ')}`);
    }
    validation.warnings.forEach((warning) => logger.warn(warning));

    this.logger = logger;
    this.errorHandler = new ErrorHandler(logger, config.fileErrorPolicy);

    const classifier = new CategoryClassifier(config.categories);
    this.organizer = new FileOrganizer(config, logger, {
      classifier,
      errorHandler: this.errorHandler,
      mover: dependencies.mover,
      now: dependencies.now,
    });
    this.reporter = new OrganizationReporter(config, logger, classifier, this.errorHandler);
  }

  /**
   * Organize `sourceDir` and write its report. Any error stops the run after
   * being logged; files moved before it stay where they are.
   */
  async run(sourceDir: string): Promise<RunSummary> {
    const sessionId = uuidv4();
    const startTime = new Date();
    const sourceDirectory = path.resolve(sourceDir);
    const organizedRoot = this.organizer.getOrganizedRoot(sourceDirectory);

    this.logger.info(`Starting organization of ${sourceDirectory}`, { sessionId });

    try {
      const result = await this.organizer.organize(sourceDirectory);
      const report = await this.reporter.writeReport(organizedRoot);
      const endTime = new Date();

      this.logger.info('Organization run finished', {
        sessionId,
        organized: result.organizedCount,
        total: result.totalCount,
        failed: result.failures.length,
      });

      return {
        ...result,
        sessionId,
        sourceDirectory,
        organizedRoot,
        categoryCounts: report.categoryCounts,
        reportPath: report.reportPath,
        startTime,
        endTime,
        duration: endTime.getTime() - startTime.getTime(),
      };
    } catch (error) {
      this.routeError(error, 'organize_directory', sourceDirectory, sessionId);
      throw error;
    }
  }

  /**
   * Rewrite the report of a directory that has already been organized
   */
  async regenerateReport(sourceDir: string): Promise<OrganizationReport> {
    const organizedRoot = this.organizer.getOrganizedRoot(path.resolve(sourceDir));

    try {
      return await this.reporter.writeReport(organizedRoot);
    } catch (error) {
      this.routeError(error, 'generate_report', organizedRoot);
      throw error;
    }
  }

  private routeError(error: unknown, operation: string, directoryPath: string, sessionId?: string): void {
    if (this.errorHandler.isHandled(error)) {
      return;
    }
    this.errorHandler.handleError(error, {
      operation,
      directoryPath,
      timestamp: new Date(),
      metadata: sessionId ? { sessionId } : undefined,
    });
  }
}
