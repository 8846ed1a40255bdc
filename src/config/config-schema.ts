import { z } from 'zod';
import type { LearningConfig } from '../learning/types.js';
import { DEFAULT_LEARNING_CONFIG } from '../learning/types.js';

/**
 * Current config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const positive = z.number().positive();
const unit = z.number().min(0).max(1);
const urgency = z.number().min(0).max(10);

/**
 * Schema of data/config/engine.json.
 *
 * Every field is optional; missing values fall back to DEFAULT_CONFIG.
 * Unknown keys are ignored so newer files still load.
 */
export const engineConfigFileSchema = z.object({
  version: z.number().int().nonnegative(),
  learning: z
    .object({
      patterns: z
        .object({
          confidenceCeiling: unit,
          confidenceScale: positive,
          minMatchSamples: z.number().nonnegative(),
          nearMatchSimilarity: unit,
          decayWindowMs: positive,
          decayFactor: unit,
          confidenceFloor: unit,
        })
        .partial(),
      keywords: z
        .object({
          learningRate: unit,
          confidenceK: positive,
          minKeywordLength: z.number().int().positive(),
        })
        .partial(),
      sources: z
        .object({
          learningRate: unit,
          minSamples: z.number().int().nonnegative(),
          decayRatePerDay: z.number().nonnegative(),
          reliabilityFloor: unit,
          knownSources: z.array(z.string().min(1)),
        })
        .partial(),
      feedback: z
        .object({
          articleWeight: positive,
          digestWeight: positive,
          irrelevantUrgency: urgency,
          outcomeWindowMs: positive,
        })
        .partial(),
      prediction: z
        .object({
          patternWeight: unit,
          keywordWeight: unit,
          patternConfidenceThreshold: unit,
          keywordConfidenceThreshold: unit,
          minTrustFactor: unit,
          neutralUrgency: urgency,
          defaultFallbackScore: urgency,
          economicWeight: z.number().nonnegative(),
          maxEconomicBoost: z.number().nonnegative(),
        })
        .partial(),
    })
    .partial()
    .optional(),
  storage: z
    .object({
      dbPath: z.string().min(1),
      busyTimeoutMs: z.number().int().nonnegative(),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']),
      pretty: z.boolean(),
      toFile: z.boolean(),
      maxFiles: z.number().int().positive(),
    })
    .partial()
    .optional(),
});

export type EngineConfigFile = z.infer<typeof engineConfigFileSchema>;

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

/**
 * Final configuration after merging defaults, config file and environment.
 */
export interface MergedConfig {
  learning: LearningConfig;

  storage: {
    /** SQLite database file */
    dbPath: string;
    /** How long a write waits on another process's lock (ms) */
    busyTimeoutMs: number;
  };

  logging: {
    level: LogLevelSetting;
    pretty: boolean;
    toFile: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    data: string;
    config: string;
    locks: string;
    logs: string;
  };
}

export const DEFAULT_CONFIG: MergedConfig = {
  learning: DEFAULT_LEARNING_CONFIG,
  storage: {
    dbPath: 'data/urgency.db',
    busyTimeoutMs: 5_000,
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    toFile: true,
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
    locks: 'data/locks',
    logs: 'data/logs',
  },
};
