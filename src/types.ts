export type RequestKind = 'role' | 'resume';

export type GenerationRequest =
  | { readonly kind: 'role'; readonly value: string }
  | { readonly kind: 'resume'; readonly value: string };

export type Backend = 'local' | 'cloud';

export type ResultStatus = 'success' | 'partial' | 'failure';

export interface QAPair {
  readonly question: string;
  readonly answer: string;
}

export interface QAResult {
  readonly subject: string;
  readonly pairs: readonly QAPair[];
  readonly totalQuestions: number;
  readonly status: ResultStatus;
}

export type ResumeFileType = 'pdf' | 'docx' | 'txt';

export interface ResumeUpload {
  filename: string;
  mimetype?: string;
  buffer: Buffer;
}

export interface QuestionsResponse {
  role: string;
  questions_and_answers: QAPair[];
  total_questions: number;
  status: ResultStatus;
  type: 'role_based' | 'resume_based';
}

export interface ResumeQuestionsResponse extends QuestionsResponse {
  filename: string;
}
