import cors from 'cors';
import express, { type Express } from 'express';

import type { AppConfig } from './config';
import type { QuestionService } from './pipeline/generateQuestions';
import healthRouter from './routes/health';
import { errorHandler, notFoundHandler, requestLogger } from './routes/middleware';
import { createQuestionsRouter } from './routes/questions';

export type AppDeps = {
  config: Pick<AppConfig, 'corsOrigins' | 'maxUploadBytes'>;
  questionService: QuestionService;
};

export const createApp = ({ config, questionService }: AppDeps): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.use(
    cors({
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
      credentials: true,
    }),
  );
  app.use(requestLogger);

  app.use(healthRouter);
  app.use(createQuestionsRouter(questionService, { maxUploadBytes: config.maxUploadBytes }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
