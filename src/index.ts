import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { describeError } from './errors';
import { createGenerationClient } from './llm/client';
import { createQuestionService } from './pipeline/generateQuestions';
import { logger } from './util/logger';

dotenv.config();

const main = (): void => {
  const config = loadConfig();
  logger.configure({ level: config.logLevel });

  if (!config.cloud.apiKey) {
    logger.warn('No cloud model API key configured. Resume-based questions will be rejected.');
  }

  const questionService = createQuestionService({
    config,
    client: createGenerationClient(config),
  });

  const app = createApp({ config, questionService });

  app.listen(config.port, () => {
    logger.info(`Server listening on port ${config.port}`, {
      localModel: config.local.model,
      cloudModel: config.cloud.model,
    });
  });
};

try {
  main();
} catch (error) {
  logger.error('Failed to start server', { error: describeError(error) });
  process.exitCode = 1;
}
