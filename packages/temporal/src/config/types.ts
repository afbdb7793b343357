/**
 * Configuration Types
 *
 * @module config/types
 */

import type { LogLevel } from '../logging/logger.js';

export interface StorageConfig {
  /** SQLite database path, or ':memory:' */
  dbPath: string;
  /** Enable WAL journal mode */
  walMode: boolean;
}

export interface InferenceConfig {
  /** Confidence attached to inferred relations */
  confidence: number;
}

export interface SegmentationConfig {
  /** Gap that starts a new segment in by_gap */
  gapThresholdSeconds: number;
  /** Batch size for the auto strategy */
  batchSize: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface CasetimeConfig {
  storage: StorageConfig;
  inference: InferenceConfig;
  segmentation: SegmentationConfig;
  logging: LoggingConfig;
}

/**
 * Optional fields of a section; undefined means "keep the default"
 */
export type Overrides<T> = { [K in keyof T]?: T[K] | undefined };

/**
 * Partial configuration, as read from a file or the environment
 */
export interface PartialCasetimeConfig {
  storage?: Overrides<StorageConfig> | undefined;
  inference?: Overrides<InferenceConfig> | undefined;
  segmentation?: Overrides<SegmentationConfig> | undefined;
  logging?: Overrides<LoggingConfig> | undefined;
}
