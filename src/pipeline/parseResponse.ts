import { EXPECTED_PAIR_COUNT } from '../llm/prompts';
import type { QAPair, QAResult, ResultStatus } from '../types';

export type ParseStrategyName = 'strict' | 'lenient' | 'heuristic';

/** Returns the valid pairs found in `reply`, or `null` when the strategy does not apply. */
export type ParseStrategy = (reply: string) => QAPair[] | null;

export type ParseOutcome = {
  result: QAResult;
  strategy: ParseStrategyName | null;
};

type RawRecord = Record<string, unknown>;

const CONTAINER_KEYS = ['questions_and_answers', 'questions', 'qa_pairs', 'pairs', 'items', 'data'];

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const fieldValue = (record: RawRecord, name: 'question' | 'answer'): unknown => {
  const key = Object.keys(record).find((candidate) => candidate.trim().toLowerCase() === name);
  return key === undefined ? undefined : record[key];
};

const toPair = (question: unknown, answer: unknown): QAPair | null => {
  if (typeof question !== 'string' || typeof answer !== 'string') {
    return null;
  }

  const q = question.trim();
  const a = answer.trim();

  return q && a ? { question: q, answer: a } : null;
};

const recordToPair = (value: unknown): QAPair | null =>
  isRecord(value) ? toPair(fieldValue(value, 'question'), fieldValue(value, 'answer')) : null;

const findEntries = (value: unknown): unknown[] | null => {
  if (Array.isArray(value)) {
    return value;
  }

  if (!isRecord(value)) {
    return null;
  }

  for (const key of CONTAINER_KEYS) {
    const candidate = value[key];
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }

  return recordToPair(value) ? [value] : null;
};

const nonEmpty = (pairs: QAPair[]): QAPair[] | null => (pairs.length > 0 ? pairs : null);

// --- Strict ---

export const parseStrict: ParseStrategy = (reply) => {
  const text = reply.trim();

  if (!text) {
    return null;
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const entries = findEntries(parsed);

  if (!entries) {
    return null;
  }

  return nonEmpty(
    entries.map(recordToPair).filter((pair): pair is QAPair => pair !== null),
  );
};

// --- Lenient ---

const FENCED_BLOCK = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)```/;
const TRAILING_COMMA = /,(\s*[\]}])/g;

const unfence = (text: string): string => {
  const match = FENCED_BLOCK.exec(text);

  if (match) {
    return match[1];
  }

  // An opening fence whose closing marker was cut off.
  return text.replace(/^\s*```[\w-]*/, '').replace(/```\s*$/, '');
};

const CLOSERS: Record<string, string> = { '[': ']', '{': '}' };

/**
 * Index of the bracket that balances the one at `start`. String literals are
 * skipped, so brackets inside values do not count.
 */
const matchingClose = (text: string, start: number): number | 'mismatched' | 'unclosed' => {
  const expected: string[] = [];
  let inString = false;

  for (let index = start; index < text.length; index += 1) {
    const char = text[index];

    if (inString) {
      if (char === '\\') {
        index += 1;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char in CLOSERS) {
      expected.push(CLOSERS[char]);
    } else if (char === ']' || char === '}') {
      if (expected.pop() !== char) {
        return 'mismatched';
      }
      if (expected.length === 0) {
        return index;
      }
    }
  }

  return 'unclosed';
};

/** Balanced top-level `[...]` and `{...}` spans, in order of appearance. */
const balancedSpans = (text: string): string[] => {
  const spans: string[] = [];
  let index = 0;

  while (index < text.length) {
    if (!(text[index] in CLOSERS)) {
      index += 1;
      continue;
    }

    const end = matchingClose(text, index);

    // Everything after an unclosed opener belongs to it.
    if (end === 'unclosed') {
      break;
    }

    if (end === 'mismatched') {
      index += 1;
      continue;
    }

    spans.push(text.slice(index, end + 1));
    index = end + 1;
  }

  return spans;
};

export const parseLenient: ParseStrategy = (reply) => {
  for (const span of balancedSpans(unfence(reply))) {
    const pairs = parseStrict(span.replace(TRAILING_COMMA, '$1'));
    if (pairs) {
      return pairs;
    }
  }

  return null;
};

// --- Heuristic ---

type LineKind = 'question' | 'answer' | 'text';

type ClassifiedLine = {
  kind: LineKind;
  text: string;
};

type PendingPair = {
  question: string;
  answer: string[];
};

const JSON_KEY_VALUE = /"(question|answer)"\s*:\s*"((?:[^"\\]|\\.)*)"?/gi;
const QUESTION_LABEL = /^q(?:uestion)?\s*#?\s*\d*\s*[:.)\-–]\s*/i;
const ANSWER_LABEL = /^a(?:nswer)?\s*#?\s*\d*\s*[:.)\-–]\s*/i;
const NUMBERED = /^\d{1,2}\s*[.):]\s*/;
const STRUCTURAL_ONLY = /^(?:[\s[\]{},"'`]*|`{3}[\w-]*)$/;

const stripMarkdown = (line: string): string =>
  line
    .replace(/\*\*|__/g, '')
    .replace(/^#{1,6}\s*/, '')
    .replace(/^[-*•]\s+/, '')
    .trim();

const unescapeJsonText = (text: string): string =>
  text.replace(/\\n/g, ' ').replace(/\\"/g, '"').replace(/\\\\/g, '\\');

const keyValues = (line: string): ClassifiedLine[] =>
  Array.from(line.matchAll(JSON_KEY_VALUE), (match): ClassifiedLine => ({
    kind: match[1].toLowerCase() === 'question' ? 'question' : 'answer',
    text: unescapeJsonText(match[2]).trim(),
  }));

/** `What is X? X is a thing.` carries its answer after the question mark. */
const splitInlineAnswer = (text: string): ClassifiedLine[] => {
  const mark = text.indexOf('?');
  const rest = mark === -1 ? '' : text.slice(mark + 1).trim();

  if (!/\w/.test(rest)) {
    return [{ kind: 'question', text }];
  }

  return [
    { kind: 'question', text: text.slice(0, mark + 1).trim() },
    { kind: 'answer', text: rest },
  ];
};

const classifyLine = (rawLine: string): ClassifiedLine[] => {
  const line = stripMarkdown(rawLine);

  if (!line || STRUCTURAL_ONLY.test(line)) {
    return [];
  }

  const fields = keyValues(line);
  if (fields.length > 0) {
    return fields;
  }

  if (ANSWER_LABEL.test(line)) {
    return [{ kind: 'answer', text: line.replace(ANSWER_LABEL, '') }];
  }

  if (QUESTION_LABEL.test(line)) {
    return splitInlineAnswer(line.replace(QUESTION_LABEL, ''));
  }

  if (NUMBERED.test(line)) {
    return splitInlineAnswer(line.replace(NUMBERED, ''));
  }

  if (line.endsWith('?')) {
    return [{ kind: 'question', text: line }];
  }

  return [{ kind: 'text', text: line }];
};

export const parseHeuristic: ParseStrategy = (reply) => {
  const pairs: QAPair[] = [];
  let pending: PendingPair | null = null;

  const flush = (): void => {
    if (pending) {
      const pair = toPair(pending.question, pending.answer.join(' '));
      if (pair) {
        pairs.push(pair);
      }
    }
    pending = null;
  };

  const lines = reply.split(/\r?\n/).flatMap(classifyLine);

  for (const line of lines) {
    if (pending === null) {
      // Prose before the first question has nothing to attach to.
      if (line.kind === 'question') {
        pending = { question: line.text, answer: [] };
      }
      continue;
    }

    const current: PendingPair = pending;

    if (line.kind === 'question') {
      if (!current.question && current.answer.length === 0) {
        current.question = line.text;
      } else {
        flush();
        pending = { question: line.text, answer: [] };
      }
      continue;
    }

    if (!current.question && line.kind === 'text') {
      current.question = line.text;
      continue;
    }

    if (line.text) {
      current.answer.push(line.text);
    }
  }

  flush();

  return nonEmpty(pairs);
};

// --- Composition ---

export const PARSE_STRATEGIES: ReadonlyArray<readonly [ParseStrategyName, ParseStrategy]> = [
  ['strict', parseStrict],
  ['lenient', parseLenient],
  ['heuristic', parseHeuristic],
];

const dropDuplicates = (pairs: QAPair[]): QAPair[] => {
  const seen = new Set<string>();

  return pairs.filter((pair) => {
    const key = JSON.stringify([pair.question, pair.answer]);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
};

export const statusFor = (count: number, expectedCount: number): ResultStatus => {
  if (count === 0) {
    return 'failure';
  }

  return count >= expectedCount ? 'success' : 'partial';
};

export const parseReply = (
  reply: string,
  subject: string,
  expectedCount: number = EXPECTED_PAIR_COUNT,
): ParseOutcome => {
  if (!Number.isInteger(expectedCount) || expectedCount < 1) {
    throw new RangeError(`expectedCount must be a positive integer, got ${expectedCount}`);
  }

  let strategy: ParseStrategyName | null = null;
  let found: QAPair[] = [];

  for (const [name, parse] of PARSE_STRATEGIES) {
    const pairs = parse(reply);
    if (pairs) {
      strategy = name;
      found = pairs;
      break;
    }
  }

  const pairs = dropDuplicates(found).slice(0, expectedCount);

  return {
    strategy,
    result: Object.freeze({
      subject,
      pairs: Object.freeze(pairs),
      totalQuestions: pairs.length,
      status: statusFor(pairs.length, expectedCount),
    }),
  };
};

/**
 * Turns a raw model reply into at most `expectedCount` question/answer pairs.
 * Malformed replies degrade to a `partial` or `failure` status; this never throws.
 */
export const parseModelReply = (
  reply: string,
  subject: string,
  expectedCount: number = EXPECTED_PAIR_COUNT,
): QAResult => parseReply(reply, subject, expectedCount).result;
