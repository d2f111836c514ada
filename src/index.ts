import dotenv from 'dotenv';
dotenv.config();
import {
  loadDownloadClientModeConfig,
  loadPreparePlanModeConfig,
  loadRunTestsModeConfig,
} from './config/app-config';
import { runDownloadClientMode } from './modes/download-client';
import { runPreparePlanMode } from './modes/prepare-plan';
import { runTestsMode } from './modes/run-tests';
import { BridgeError, errorMessage } from './utils/errors';
import logger, { createContextLogger } from './utils/logger';
import type { ContextLogger } from './utils/logger';
import { generateInvocationId } from './utils/uuid-generator';

type CommandHandler = (log: ContextLogger) => Promise<void>;

const commands = new Map<string, CommandHandler>([
  ['prepare-plan', log => runPreparePlanMode(loadPreparePlanModeConfig(process.env), log)],
  ['download-client', log => runDownloadClientMode(loadDownloadClientModeConfig(process.env), log)],
  ['run', log => runTestsMode(loadRunTestsModeConfig(process.env), log)],
]);

async function main(): Promise<number> {
  const command = process.argv[2] ?? '';
  const contextLogger = createContextLogger({ invocation_id: generateInvocationId(), command });
  const handler = commands.get(command);

  if (!handler) {
    contextLogger.error(`Unknown command "${command}"`, { available: [...commands.keys()] });
    return 1;
  }

  try {
    contextLogger.info('Starting command');
    await handler(contextLogger);
    contextLogger.info('Command completed');
    return 0;
  } catch (error) {
    contextLogger.fatal('Command failed', {
      error: errorMessage(error),
      error_code: error instanceof BridgeError ? error.code : undefined,
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }
}

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Fatal error', { error: errorMessage(error) });
    process.exit(1);
  });
