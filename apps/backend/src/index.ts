import dotenv from 'dotenv';
import { loadConfig } from '@/config';
import { createApp, startServer } from '@/app';
import { createLogger } from '@/lib/logger';
import { createBookAssistant } from '@/services/bookAssistant';

dotenv.config();

function exitOnStartupError(error: unknown): never {
  console.error('Error initializing application:', error);
  process.exit(1);
}

try {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const assistant = createBookAssistant(config, logger);
  const app = createApp(assistant, logger);

  startServer(app, config.port)
    .then(() => logger.info(`Server running on port ${config.port}`))
    .catch(exitOnStartupError);
} catch (error) {
  exitOnStartupError(error);
}
