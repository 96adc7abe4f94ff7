// Configuration management for organizer runs

import {
  CollisionStrategy,
  ConfigValidationResult,
  FileErrorPolicy,
  LogLevel,
  OrganizerConfig,
} from '../types';
import {
  CATEGORY_TABLE,
  DEFAULT_ORGANIZER_CONFIG,
  LOG_LEVELS,
  MISC_CATEGORY,
  SUPPORTED_COLLISION_STRATEGIES,
  SUPPORTED_FILE_ERROR_POLICIES,
} from './constants';

export interface OrganizerConfigValidationResult extends ConfigValidationResult {
  warnings: string[];
}

function isOneOf<T extends string>(options: readonly T[], value: string): value is T {
  return options.some((option) => option === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return isOneOf(Object.values(LOG_LEVELS), value);
}

export function isCollisionStrategy(value: string): value is CollisionStrategy {
  return isOneOf(SUPPORTED_COLLISION_STRATEGIES, value);
}

export function isFileErrorPolicy(value: string): value is FileErrorPolicy {
  return isOneOf(SUPPORTED_FILE_ERROR_POLICIES, value);
}

export class OrganizerConfigManager {
  /**
   * Create a default organizer configuration
   */
  static createDefault(): OrganizerConfig {
    return {
      ...DEFAULT_ORGANIZER_CONFIG,
      categories: CATEGORY_TABLE,
    };
  }

  /**
   * Create organizer configuration from environment variables. Unknown
   * values fall back to the defaults.
   */
  static createFromEnv(env: NodeJS.ProcessEnv = process.env): OrganizerConfig {
    const defaultConfig = OrganizerConfigManager.createDefault();

    const logLevel = (env.LOG_LEVEL || '').toUpperCase();
    const collisionStrategy = env.ORGANIZER_COLLISION_STRATEGY || '';
    const fileErrorPolicy = env.ORGANIZER_ON_FILE_ERROR || '';

    return {
      ...defaultConfig,
      logFilePath: env.LOG_FILE_PATH || defaultConfig.logFilePath,
      logLevel: isLogLevel(logLevel) ? logLevel : defaultConfig.logLevel,
      collisionStrategy: isCollisionStrategy(collisionStrategy)
        ? collisionStrategy
        : defaultConfig.collisionStrategy,
      fileErrorPolicy: isFileErrorPolicy(fileErrorPolicy)
        ? fileErrorPolicy
        : defaultConfig.fileErrorPolicy,
    };
  }

  /**
   * Merge user configuration with defaults
   */
  static mergeWithDefaults(userConfig: Partial<OrganizerConfig>): OrganizerConfig {
    return {
      ...OrganizerConfigManager.createDefault(),
      ...userConfig,
    };
  }

  static validateConfig(config: OrganizerConfig): OrganizerConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const [field, value] of [
      ['Organized directory name', config.organizedDirectoryName],
      ['Report file name', config.reportFileName],
    ] as const) {
      if (!value || value.trim().length === 0) {
        errors.push(`${field} cannot be empty`);
      } else if (value.includes('/') || value.includes('\\') || value === '.' || value === '..') {
        errors.push(`${field} must be a single path component`);
      }
    }

    if (!config.logFilePath || config.logFilePath.trim().length === 0) {
      errors.push('Log file path cannot be empty');
    }

    if (!isLogLevel(config.logLevel)) {
      errors.push(`Log level must be one of: ${Object.values(LOG_LEVELS).join(', ')}`);
    }

    if (!isCollisionStrategy(config.collisionStrategy)) {
      errors.push(
        `Collision strategy must be one of: ${SUPPORTED_COLLISION_STRATEGIES.join(', ')}`
      );
    }

    if (!isFileErrorPolicy(config.fileErrorPolicy)) {
      errors.push(
        `File error policy must be one of: ${SUPPORTED_FILE_ERROR_POLICIES.join(', ')}`
      );
    }

    const seenNames = new Set<string>();
    const seenExtensions = new Map<string, string>();
    for (const category of config.categories) {
      if (category.name === MISC_CATEGORY) {
        errors.push(`Category name "${MISC_CATEGORY}" is reserved`);
      }
      if (seenNames.has(category.name)) {
        errors.push(`Duplicate category name "${category.name}"`);
      }
      seenNames.add(category.name);

      for (const extension of category.extensions) {
        if (!extension.startsWith('.') || extension !== extension.toLowerCase()) {
          errors.push(
            `Extension "${extension}" in "${category.name}" must be lower-case and start with a dot`
          );
        }
        const owner = seenExtensions.get(extension);
        if (owner !== undefined) {
          warnings.push(
            `Extension "${extension}" is listed in both "${owner}" and "${category.name}"; "${owner}" wins`
          );
        } else {
          seenExtensions.set(extension, category.name);
        }
      }
    }

    return {
      isValid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * Get configuration summary for display
   */
  static getConfigSummary(config: OrganizerConfig): Record<string, unknown> {
    return {
      'Organized Directory': config.organizedDirectoryName,
      'Report File': config.reportFileName,
      'Log File': config.logFilePath,
      'Log Level': config.logLevel,
      'Collision Strategy': config.collisionStrategy,
      'On File Error': config.fileErrorPolicy,
      Categories: [...config.categories.map((category) => category.name), MISC_CATEGORY].join(', '),
    };
  }
}
