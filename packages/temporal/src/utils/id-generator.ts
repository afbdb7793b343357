/**
 * ID Generator
 *
 * Generates unique IDs for temporal facts.
 * Uses a combination of timestamp and random bytes.
 */

import { randomBytes } from 'crypto';

/**
 * Generate a unique fact ID
 * Format: fact_<timestamp>_<random>
 */
export function generateFactId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(6).toString('hex');
  return `fact_${timestamp}_${random}`;
}
