import { type AppConfig, requireCloudApiKey } from '../config';
import { InvalidInputError } from '../errors';
import { backendFor, type GenerationClient } from '../llm/client';
import { buildPrompt } from '../llm/prompts';
import type { GenerationRequest, QAResult, ResumeUpload } from '../types';
import { logger } from '../util/logger';
import { extractResumeText, type ExtractedText } from './extractText';
import { parseReply } from './parseResponse';

export const RESUME_SUBJECT = 'resume';
export const MIN_RESUME_CHARS = 50;
export const ROLE_MIN_LENGTH = 2;
export const ROLE_MAX_LENGTH = 100;

export type QuestionServiceDeps = {
  config: Pick<AppConfig, 'cloud' | 'resumeMaxChars'>;
  client: Pick<GenerationClient, 'generate'>;
  extract?: (upload: ResumeUpload) => Promise<ExtractedText>;
};

export type ResumeQuestions = {
  filename: string;
  result: QAResult;
};

export interface QuestionService {
  generateForRole(role: string): Promise<QAResult>;
  generateForResume(upload: ResumeUpload): Promise<ResumeQuestions>;
}

export const normalizeRole = (role: string): string => {
  const trimmed = role.trim();

  if (!trimmed) {
    throw new InvalidInputError('Role cannot be empty');
  }

  if (trimmed.length < ROLE_MIN_LENGTH) {
    throw new InvalidInputError(`Role must be at least ${ROLE_MIN_LENGTH} characters long`);
  }

  if (trimmed.length > ROLE_MAX_LENGTH) {
    throw new InvalidInputError(`Role must be at most ${ROLE_MAX_LENGTH} characters long`);
  }

  return trimmed;
};

export const createQuestionService = ({
  config,
  client,
  extract = extractResumeText,
}: QuestionServiceDeps): QuestionService => {
  const run = async (request: GenerationRequest, subject: string): Promise<QAResult> => {
    const prompt = buildPrompt(request, { resumeMaxChars: config.resumeMaxChars });
    const backend = backendFor(request.kind);

    logger.info(`Requesting questions from ${backend} backend`, {
      kind: request.kind,
      promptChars: prompt.length,
    });

    const reply = await client.generate(prompt, backend);
    logger.debug('Raw model reply', { backend, reply });

    const { result, strategy } = parseReply(reply, subject);
    const summary = {
      kind: request.kind,
      strategy,
      status: result.status,
      totalQuestions: result.totalQuestions,
    };

    if (result.status === 'success') {
      logger.info('Parsed model reply', summary);
    } else {
      logger.warn('Model reply was incomplete', summary);
    }

    return result;
  };

  return {
    async generateForRole(role) {
      const subject = normalizeRole(role);
      logger.info('Generating questions for role', { role: subject });
      return run({ kind: 'role', value: subject }, subject);
    },

    async generateForResume(upload) {
      requireCloudApiKey(config);

      logger.info('Processing resume file', { filename: upload.filename, bytes: upload.buffer.length });
      const extracted = await extract(upload);

      if (extracted.charCount < MIN_RESUME_CHARS) {
        throw new InvalidInputError('Resume text is too short or empty. Please upload a valid resume.');
      }

      logger.info(`Extracted ${extracted.charCount} characters from resume`, {
        filename: upload.filename,
        fileType: extracted.fileType,
      });

      const result = await run({ kind: 'resume', value: extracted.text }, RESUME_SUBJECT);

      return { filename: upload.filename, result };
    },
  };
};
