// Plain-text summary of what ended up in each category folder

import * as fs from 'fs/promises';
import * as path from 'path';
import { Logger, OrganizerConfig } from '../types';
import { REPORT_SEPARATOR, REPORT_TITLE } from '../core/constants';
import { ErrorHandler } from '../core/error-handler';
import { ErrorContext, ReportWriteError, getErrorCode, getErrorMessage } from '../core/errors';
import { CategoryClassifier } from '../services/local/category-classifier';
import { PathUtils } from '../services/local/path-utils';

export interface OrganizationReport {
  reportPath: string;
  content: string;
  categoryCounts: Record<string, number>;
}

/**
 * Counts the files in every category folder of an organized root and writes
 * the summary next to them. Reads only the directory state, never the
 * organizer's own bookkeeping.
 */
export class OrganizationReporter {
  private readonly config: OrganizerConfig;
  private readonly logger: Logger;
  private readonly classifier: CategoryClassifier;
  private readonly errorHandler: ErrorHandler;

  constructor(
    config: OrganizerConfig,
    logger: Logger,
    classifier: CategoryClassifier = new CategoryClassifier(config.categories),
    errorHandler: ErrorHandler = new ErrorHandler(logger, config.fileErrorPolicy)
  ) {
    this.config = config;
    this.logger = logger;
    this.classifier = classifier;
    this.errorHandler = errorHandler;
  }

  /**
   * Write the report for `organizedRoot` and return its text
   */
  async generateReport(organizedRoot: string): Promise<string> {
    const { content } = await this.writeReport(organizedRoot);
    return content;
  }

  async writeReport(organizedRoot: string): Promise<OrganizationReport> {
    const reportPath = path.join(organizedRoot, this.config.reportFileName);
    let categoryCounts: Record<string, number>;
    let content: string;

    try {
      categoryCounts = await this.countFiles(organizedRoot);
      content = this.formatReport(categoryCounts);
      await fs.writeFile(reportPath, content, 'utf8');
    } catch (cause) {
      const context: ErrorContext = {
        operation: 'write_report',
        destinationPath: reportPath,
        timestamp: new Date(),
      };
      const error = new ReportWriteError(
        `Failed to write report ${reportPath}: ${getErrorMessage(cause)}`,
        context,
        cause
      );
      this.errorHandler.handleError(error, context);
      throw error;
    }

    this.logger.info('Report generated successfully', { reportPath });

    return { reportPath, content, categoryCounts };
  }

  /**
   * Regular files directly inside each category folder, in table order with
   * misc last. Links to files count, as they do when organizing. A missing
   * folder counts as empty.
   */
  async countFiles(organizedRoot: string): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};

    for (const category of this.classifier.getCategoryNames()) {
      counts[category] = await this.countDirectory(path.join(organizedRoot, category));
    }

    return counts;
  }

  formatReport(categoryCounts: Record<string, number>): string {
    const lines = [REPORT_TITLE, REPORT_SEPARATOR];

    for (const category of this.classifier.getCategoryNames()) {
      const label = this.classifier.getCategoryLabel(category);
      lines.push(`${label}: ${categoryCounts[category] ?? 0} files`);
    }

    return lines.join('\n');
  }

  private async countDirectory(directoryPath: string): Promise<number> {
    try {
      const entries = await fs.readdir(directoryPath, { withFileTypes: true });
      let count = 0;
      for (const entry of entries) {
        if (await PathUtils.isRegularFile(entry, path.join(directoryPath, entry.name))) {
          count++;
        }
      }
      return count;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        this.logger.debug(`Category folder missing, counting as empty: ${directoryPath}`);
        return 0;
      }
      throw error;
    }
  }
}
