import { InvalidInputError } from '../errors';
import type { GenerationRequest } from '../types';

export const EXPECTED_PAIR_COUNT = 5;
export const DEFAULT_RESUME_MAX_CHARS = 4000;

const OUTPUT_CONTRACT = `Respond ONLY with a valid JSON array of exactly ${EXPECTED_PAIR_COUNT} objects, in this shape:
[
  { "question": "<question>", "answer": "<model answer>" }
]
Do not wrap the JSON in markdown and do not add any text before or after it.`;

const ROLE_PROMPT = (role: string): string => `You are an expert interviewer.

Generate exactly ${EXPECTED_PAIR_COUNT} realistic interview questions and answers for the job role: ${role}.

Make 3 technical and 2 HR-based.

${OUTPUT_CONTRACT}`;

const RESUME_PROMPT = (resumeText: string): string => `You are an expert interviewer reviewing a candidate's resume.

Infer the candidate's professional domain and seniority from the resume below, then generate exactly ${EXPECTED_PAIR_COUNT} personalised interview questions with strong model answers.

Make 3 technical questions grounded in the skills and projects listed, and 2 HR-based questions about the candidate's experience and motivation.

Resume:
"""
${resumeText}
"""

${OUTPUT_CONTRACT}`;

type PromptOptions = {
  resumeMaxChars?: number;
};

export const truncateResume = (text: string, maxChars: number): string =>
  text.length > maxChars ? text.slice(0, maxChars) : text;

export const buildPrompt = (
  request: GenerationRequest,
  { resumeMaxChars = DEFAULT_RESUME_MAX_CHARS }: PromptOptions = {},
): string => {
  const value = request.value.trim();

  if (!value) {
    throw new InvalidInputError(
      request.kind === 'role' ? 'Role cannot be empty' : 'Resume text cannot be empty',
    );
  }

  return request.kind === 'role'
    ? ROLE_PROMPT(value)
    : RESUME_PROMPT(truncateResume(value, resumeMaxChars));
};
