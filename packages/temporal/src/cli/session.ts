/**
 * CLI session helpers
 *
 * Loads configuration, builds the logger and opens a case file for
 * the duration of one command.
 */

import * as path from 'node:path';

import { ConfigLoader } from '../config/config-loader.js';
import { ConsoleLogger, type Logger } from '../logging/logger.js';
import type { CasetimeConfig } from '../config/types.js';
import { loadCase, readCaseFile, type LoadedCase } from './case-file.js';

export interface GlobalOptions {
  /** Directory holding .casetime/config.json */
  root?: string | undefined;
  verbose?: boolean | undefined;
}

export interface CommandSession {
  config: CasetimeConfig;
  logger: Logger;
}

export async function createSession(options: GlobalOptions = {}): Promise<CommandSession> {
  const loader = new ConfigLoader({ rootDir: options.root ?? process.cwd() });
  const { config } = await loader.load();
  const level = options.verbose ? 'debug' : config.logging.level;
  return { config, logger: new ConsoleLogger(level) };
}

/**
 * Open a case file, run the work and close the timeline afterwards
 */
export async function withCase<T>(
  caseFilePath: string,
  options: GlobalOptions,
  work: (loaded: LoadedCase, session: CommandSession) => Promise<T>,
): Promise<T> {
  const session = await createSession(options);
  const caseFile = await readCaseFile(path.resolve(caseFilePath));
  const loaded = await loadCase(caseFile, session.config, session.logger);

  try {
    return await work(loaded, session);
  } finally {
    loaded.service.close();
  }
}
