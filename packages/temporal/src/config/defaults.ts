/**
 * Default configuration
 */

import type { CasetimeConfig } from './types.js';

export const DEFAULT_CONFIG: CasetimeConfig = {
  storage: {
    dbPath: '.casetime/timeline.db',
    walMode: true,
  },
  inference: {
    confidence: 0.8,
  },
  segmentation: {
    gapThresholdSeconds: 3600,
    batchSize: 5,
  },
  logging: {
    level: 'info',
  },
};
