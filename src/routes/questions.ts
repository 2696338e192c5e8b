import { Router } from 'express';
import multer from 'multer';
import { z } from 'zod';

import { InvalidInputError } from '../errors';
import type { QuestionService } from '../pipeline/generateQuestions';
import type { QAResult, QuestionsResponse, ResumeQuestionsResponse } from '../types';
import { asyncHandler } from './middleware';

const roleQuerySchema = z.object({
  role: z.string({
    required_error: 'role query parameter is required',
    invalid_type_error: 'role must be a single string',
  }),
});

type QuestionsRouterOptions = {
  maxUploadBytes: number;
};

export const toQuestionsResponse = (
  result: QAResult,
  type: QuestionsResponse['type'],
): QuestionsResponse => ({
  role: result.subject,
  questions_and_answers: result.pairs.map(({ question, answer }) => ({ question, answer })),
  total_questions: result.totalQuestions,
  status: result.status,
  type,
});

export const createQuestionsRouter = (
  service: QuestionService,
  { maxUploadBytes }: QuestionsRouterOptions,
): Router => {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  router.get(
    '/generate_questions',
    asyncHandler(async (req, res) => {
      const validation = roleQuerySchema.safeParse(req.query);

      if (!validation.success) {
        throw new InvalidInputError(validation.error.issues.map((issue) => issue.message).join('; '));
      }

      const result = await service.generateForRole(validation.data.role);

      res.json(toQuestionsResponse(result, 'role_based'));
    }),
  );

  router.post(
    '/generate_questions_from_resume',
    upload.single('file'),
    asyncHandler(async (req, res) => {
      const file = req.file;

      if (!file || !file.originalname) {
        throw new InvalidInputError('No file uploaded');
      }

      const { filename, result } = await service.generateForResume({
        filename: file.originalname,
        mimetype: file.mimetype,
        buffer: file.buffer,
      });

      const body: ResumeQuestionsResponse = {
        ...toQuestionsResponse(result, 'resume_based'),
        filename,
      };

      res.json(body);
    }),
  );

  return router;
};
