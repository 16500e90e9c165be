/**
 * Command-line runner: validate configuration, run the workflow, report.
 */

import { buildConfig, loadEnv, type AppConfig } from './config/index.js';
import { createLogger, type Logger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { createDependencies, runMarketWrap } from './workflow.js';
import type { MarketWrapDeps } from './context.js';
import type { PipelineResult } from './types/index.js';

const RULE = '='.repeat(80);

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  /** Replace the real collaborators, e.g. in tests */
  createDeps?: (config: AppConfig, logger: Logger) => MarketWrapDeps;
  logger?: Logger;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Print the outcome and return the process exit code:
 * 0 when something was delivered, 1 on total failure.
 */
export function reportResult(result: PipelineResult, io: CliIo): number {
  switch (result.status) {
    case 'delivered':
      if (result.path === 'primary') {
        io.out('');
        io.out('🎉 FINANCIAL MARKET WRAP - COMPLETE');
        io.out(RULE);
        io.out(result.confirmation);
        io.out(RULE);
      } else {
        io.err(`🔧 Workflow Error: ${result.primaryError}`);
        io.out(`🔄 Fallback completed: ${result.confirmation}`);
      }
      return 0;
    case 'failed':
      io.err(`🔧 Workflow Error: ${result.primaryError}`);
      io.err(`❌ Complete system failure: ${result.error}`);
      return 1;
  }
}

export async function main(options: CliOptions = {}): Promise<number> {
  const { env = process.env, io = consoleIo, createDeps = createDependencies } = options;

  let config: AppConfig;
  try {
    config = buildConfig(loadEnv(env));
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(error.message);
      io.err('❌ Environment validation failed. Please check your .env file.');
      return 1;
    }
    throw error;
  }

  const logger =
    options.logger ?? createLogger({ level: config.logging.level, file: config.logging.file });

  logger.info(
    { env: config.app.env, model: config.llm.model, timeZone: config.report.timeZone },
    '🚀 Starting financial market wrap workflow'
  );

  const result = await runMarketWrap(createDeps(config, logger));
  return reportResult(result, io);
}
