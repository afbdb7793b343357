/**
 * Shared test fixtures
 */

import type { EntityDescriptor } from '../types/entity.js';
import type { EntityKind, OwnerRef } from '../types/temporal.js';
import type { Logger } from '../logging/logger.js';
import type { CasetimeConfig } from '../config/types.js';
import { StaticEntityResolver } from '../resolvers/static.js';
import { TimelineService } from '../service/timeline-service.js';
import { createInMemoryFactStorage } from '../storage/factory.js';
import type { IFactStorage } from '../storage/interface.js';

export const SCOPE = 'case-1';

/** UTC time on 2024-03-01, e.g. at('09:30') */
export function at(time: string, day = '2024-03-01'): Date {
  return new Date(`${day}T${time.length === 5 ? `${time}:00` : time}Z`);
}

export function ref(kind: EntityKind, id: string): OwnerRef {
  return { kind, id };
}

export interface LogEntry {
  level: 'error' | 'warn' | 'info' | 'debug';
  message: string;
  context: Record<string, unknown> | undefined;
}

/**
 * Logger keeping every entry for assertions
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  error(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  messages(level: LogEntry['level']): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

export interface TestContext {
  service: TimelineService;
  resolver: StaticEntityResolver;
  storage: IFactStorage;
  logger: RecordingLogger;
}

export function createTestContext(
  entities: Array<[OwnerRef, EntityDescriptor]> = [],
  config?: CasetimeConfig,
): TestContext {
  const resolver = new StaticEntityResolver(entities);
  const storage = createInMemoryFactStorage();
  const logger = new RecordingLogger();
  const service = new TimelineService({ storage, resolver, logger, config });
  return { service, resolver, storage, logger };
}
