import path from 'node:path';
import mammoth from 'mammoth';
import pdfParse from 'pdf-parse';

import { describeError, ExtractionError, InvalidInputError } from '../errors';
import type { ResumeFileType, ResumeUpload } from '../types';

export type ExtractedText = {
  text: string;
  fileType: ResumeFileType;
  charCount: number;
};

export const SUPPORTED_FILE_TYPES: readonly ResumeFileType[] = ['pdf', 'docx', 'txt'];

const MIME_FILE_TYPES: Record<string, ResumeFileType> = {
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'text/plain': 'txt',
};

const isSupportedType = (value: string): value is ResumeFileType =>
  SUPPORTED_FILE_TYPES.some((type) => type === value);

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * The extension decides when the filename has one; the declared MIME type is
 * only consulted for extensionless uploads.
 */
export const resolveFileType = (filename: string, mimetype?: string): ResumeFileType | null => {
  const extension = path.extname(filename).slice(1).toLowerCase();

  if (extension) {
    return isSupportedType(extension) ? extension : null;
  }

  const declared = mimetype?.split(';')[0].trim().toLowerCase();

  return declared ? MIME_FILE_TYPES[declared] ?? null : null;
};

const normalizeWhitespace = (text: string): string =>
  text
    .replace(/\f/g, '\n')
    .replace(/\r\n?/g, '\n')
    .replace(/\n{4,}/g, '\n\n\n')
    .trim();

/** UTF-8 when the bytes are valid UTF-8, otherwise Latin-1, which accepts any byte sequence. */
export const decodeText = (buffer: Buffer): string => {
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
};

const readPdf = async (buffer: Buffer): Promise<string> => {
  const result = await pdfParse(buffer);
  return result.text ?? '';
};

const readDocx = async (buffer: Buffer): Promise<string> => {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
};

const READERS: Record<ResumeFileType, (buffer: Buffer) => Promise<string>> = {
  pdf: readPdf,
  docx: readDocx,
  txt: async (buffer) => decodeText(buffer),
};

export const extractResumeText = async ({
  filename,
  mimetype,
  buffer,
}: ResumeUpload): Promise<ExtractedText> => {
  const fileType = resolveFileType(filename, mimetype);

  if (!fileType) {
    throw new InvalidInputError(
      `Unsupported file type. Allowed: ${SUPPORTED_FILE_TYPES.join(', ')}`,
    );
  }

  if (buffer.length === 0) {
    throw new InvalidInputError(`Uploaded file "${filename}" is empty.`);
  }

  let raw: string;

  try {
    raw = await READERS[fileType](buffer);
  } catch (error) {
    throw new ExtractionError(
      filename,
      fileType,
      `Could not read "${filename}" as ${fileType.toUpperCase()}: ${describeError(error)}`,
      { cause: error },
    );
  }

  const text = normalizeWhitespace(raw);

  if (!text) {
    throw new ExtractionError(
      filename,
      fileType,
      `No text could be extracted from "${filename}". The document may be empty or image-based.`,
    );
  }

  return {
    text,
    fileType,
    charCount: text.length,
  };
};
