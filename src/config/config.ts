/**
 * chain-confidence - Configuration Manager
 * Defaults, then .confidencerc / confidence.config.json, then CONFIDENCE_* environment variables
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { logger } from '../services/Logger.js';
import { CALIBRATION, MAX_CONFIDENCE, MIN_CONFIDENCE, TARGET_CONFIDENCE } from './constants.js';

const unit = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();

const ConfidenceSettingsSchema = z.object({
  min: unit,
  max: unit,
  target: unit,
});

const RatingScaleSchema = z.object({
  min: z.number(),
  max: z.number(),
});

export const CalibrationSettingsSchema = z.object({
  historyLimit: positiveInt,
  metricsWindow: positiveInt,
  recentAdjustments: positiveInt,
  ratingScale: RatingScaleSchema,
});

const LoggingSettingsSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  headless: z.boolean(),
});

export const EngineConfigSchema = z
  .object({
    confidence: ConfidenceSettingsSchema,
    calibration: CalibrationSettingsSchema,
    logging: LoggingSettingsSchema,
  })
  .superRefine((config, ctx) => {
    const { min, max, target } = config.confidence;
    if (min > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['confidence', 'min'], message: 'min cannot be greater than max' });
    }
    if (target < min || target > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['confidence', 'target'], message: 'target must lie between min and max' });
    }
    const scale = config.calibration.ratingScale;
    if (scale.min >= scale.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['calibration', 'ratingScale'], message: 'rating scale min must be below max' });
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type ConfidenceSettings = EngineConfig['confidence'];
export type CalibrationSettings = EngineConfig['calibration'];
export type LoggingSettings = EngineConfig['logging'];

// Shape accepted from config files: every section and field optional
const FileConfigSchema = z.object({
  confidence: ConfidenceSettingsSchema.partial().optional(),
  calibration: CalibrationSettingsSchema.partial().optional(),
  logging: LoggingSettingsSchema.partial().optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = {
  confidence: {
    min: MIN_CONFIDENCE,
    max: MAX_CONFIDENCE,
    target: TARGET_CONFIDENCE,
  },
  calibration: {
    historyLimit: CALIBRATION.historyLimit,
    metricsWindow: CALIBRATION.metricsWindow,
    recentAdjustments: CALIBRATION.recentAdjustments,
    ratingScale: { ...CALIBRATION.ratingScale },
  },
  logging: {
    level: 'info',
    headless: false,
  },
};

export const CONFIG_FILE_NAMES = ['.confidencerc', '.confidencerc.json', 'confidence.config.json'];

export interface ConfigManagerOptions {
  /** Explicit config file; skips discovery */
  path?: string;
  /** Directory searched for config files (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration loader with file discovery and environment overrides
 */
export class ConfigManager {
  private config: EngineConfig;
  private configPath?: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.config = structuredClone(DEFAULT_CONFIG);
    this.loadFromFiles(options.path, options.cwd ?? process.cwd());
    this.loadFromEnv(options.env ?? process.env);
    this.config = ConfigManager.validate(this.config);
  }

  /**
   * Validate a complete configuration
   */
  static validate(config: unknown): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, {
        context: { issues },
      });
    }
    return parsed.data;
  }

  /**
   * Load the first config file found (custom path > .confidencerc > .confidencerc.json > confidence.config.json)
   */
  private loadFromFiles(customPath: string | undefined, cwd: string): void {
    const searchPaths = customPath ? [customPath] : CONFIG_FILE_NAMES.map((name) => join(cwd, name));

    for (const filePath of searchPaths) {
      if (!existsSync(filePath)) continue;

      let content: unknown;
      try {
        content = JSON.parse(readFileSync(filePath, 'utf-8'));
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        logger.warn(`[Config] Skipping unreadable config file ${filePath}: ${msg}`);
        continue;
      }

      const parsed = FileConfigSchema.safeParse(content);
      if (!parsed.success) {
        logger.warn(`[Config] Skipping invalid config file ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
        continue;
      }

      this.mergeConfig(parsed.data);
      this.configPath = filePath;
      break;
    }
  }

  /**
   * Load CONFIDENCE_* environment variables
   */
  private loadFromEnv(env: NodeJS.ProcessEnv): void {
    if (env.CONFIDENCE_MIN) {
      this.config.confidence.min = parseFloat(env.CONFIDENCE_MIN);
    }
    if (env.CONFIDENCE_MAX) {
      this.config.confidence.max = parseFloat(env.CONFIDENCE_MAX);
    }
    if (env.CONFIDENCE_TARGET) {
      this.config.confidence.target = parseFloat(env.CONFIDENCE_TARGET);
    }

    if (env.CONFIDENCE_HISTORY_LIMIT) {
      this.config.calibration.historyLimit = parseInt(env.CONFIDENCE_HISTORY_LIMIT, 10);
    }
    if (env.CONFIDENCE_METRICS_WINDOW) {
      this.config.calibration.metricsWindow = parseInt(env.CONFIDENCE_METRICS_WINDOW, 10);
    }

    const level = LoggingSettingsSchema.shape.level.safeParse(env.CONFIDENCE_LOG_LEVEL);
    if (level.success) {
      this.config.logging.level = level.data;
    } else if (env.CONFIDENCE_LOG_LEVEL) {
      logger.warn(`[Config] Ignoring unknown CONFIDENCE_LOG_LEVEL "${env.CONFIDENCE_LOG_LEVEL}"`);
    }
    if (env.CONFIDENCE_HEADLESS !== undefined) {
      this.config.logging.headless = env.CONFIDENCE_HEADLESS === 'true';
    }
  }

  /**
   * Merge partial config into current config
   */
  private mergeConfig(partial: FileConfig): void {
    if (partial.confidence) {
      this.config.confidence = { ...this.config.confidence, ...partial.confidence };
    }
    if (partial.calibration) {
      this.config.calibration = { ...this.config.calibration, ...partial.calibration };
    }
    if (partial.logging) {
      this.config.logging = { ...this.config.logging, ...partial.logging };
    }
  }

  // Getters
  get confidence(): ConfidenceSettings {
    return this.config.confidence;
  }

  get calibration(): CalibrationSettings {
    return this.config.calibration;
  }

  get logging(): LoggingSettings {
    return this.config.logging;
  }

  get sourcePath(): string | undefined {
    return this.configPath;
  }

  getAll(): EngineConfig {
    return structuredClone(this.config);
  }
}
