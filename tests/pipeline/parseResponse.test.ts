import { describe, expect, it } from 'vitest';

import {
  parseHeuristic,
  parseLenient,
  parseModelReply,
  parseReply,
  parseStrict,
} from '../../src/pipeline/parseResponse';

const makePairs = (count: number) =>
  Array.from({ length: count }, (_, index) => ({
    question: `Question ${index + 1}?`,
    answer: `Answer ${index + 1}.`,
  }));

describe('parseModelReply', () => {
  it('returns a partial result for a single well-formed pair', () => {
    const reply = '[{"question":"What is a list?","answer":"An ordered collection."}]';

    expect(parseModelReply(reply, 'Python Developer', 5)).toEqual({
      subject: 'Python Developer',
      pairs: [{ question: 'What is a list?', answer: 'An ordered collection.' }],
      totalQuestions: 1,
      status: 'partial',
    });
  });

  it('returns exactly five pairs in order for a well-formed reply', () => {
    const result = parseModelReply(JSON.stringify(makePairs(5)), 'Data Scientist');

    expect(result.status).toBe('success');
    expect(result.totalQuestions).toBe(5);
    expect(result.pairs).toEqual(makePairs(5));
  });

  it('truncates longer replies to the first five pairs', () => {
    const result = parseModelReply(JSON.stringify(makePairs(7)), 'Backend Engineer');

    expect(result.status).toBe('success');
    expect(result.pairs.map((pair) => pair.question)).toEqual([
      'Question 1?',
      'Question 2?',
      'Question 3?',
      'Question 4?',
      'Question 5?',
    ]);
  });

  it('strips code fences and surrounding prose', () => {
    const reply = `Here are your questions:\n\`\`\`json\n${JSON.stringify(makePairs(5), null, 2)}\n\`\`\`\nGood luck!`;

    const outcome = parseReply(reply, 'QA Engineer');

    expect(outcome.strategy).toBe('lenient');
    expect(outcome.result.status).toBe('success');
    expect(outcome.result.pairs).toEqual(makePairs(5));
  });

  it('returns a failure for an empty reply without throwing', () => {
    expect(parseModelReply('', 'Designer')).toEqual({
      subject: 'Designer',
      pairs: [],
      totalQuestions: 0,
      status: 'failure',
    });
  });

  it('returns a failure for prose with no recognisable questions', () => {
    const result = parseModelReply('I am sorry, I cannot help with that request.', 'Designer');

    expect(result.status).toBe('failure');
    expect(result.pairs).toEqual([]);
  });

  it('drops entries with empty or non-string fields before counting', () => {
    const reply = JSON.stringify([
      { question: '   ', answer: 'Orphan answer.' },
      { question: 'What is REST?', answer: '  An architectural style.  ' },
      { question: 42, answer: 'Not a question.' },
      { question: 'What is gRPC?', answer: '' },
    ]);

    const result = parseModelReply(reply, 'API Engineer');

    expect(result.pairs).toEqual([{ question: 'What is REST?', answer: 'An architectural style.' }]);
    expect(result.status).toBe('partial');
  });

  it('removes byte-identical duplicate pairs but keeps near duplicates', () => {
    const reply = JSON.stringify([
      { question: 'Why this team?', answer: 'Growth.' },
      { question: 'Why this team?', answer: 'Growth.' },
      { question: 'Why this team?', answer: 'Mission.' },
    ]);

    expect(parseModelReply(reply, 'PM').pairs).toEqual([
      { question: 'Why this team?', answer: 'Growth.' },
      { question: 'Why this team?', answer: 'Mission.' },
    ]);
  });

  it('keeps totalQuestions equal to the number of pairs', () => {
    const replies = [
      '',
      JSON.stringify(makePairs(2)),
      JSON.stringify(makePairs(9)),
      '1. What is Git?\nA version control system.',
    ];

    for (const reply of replies) {
      const result = parseModelReply(reply, 'DevOps Engineer');
      expect(result.totalQuestions).toBe(result.pairs.length);
    }
  });

  it('is idempotent for the same reply', () => {
    const reply = 'Q1: What is a mutex?\nA: A lock for mutual exclusion.';

    expect(parseModelReply(reply, 'Systems Engineer')).toEqual(
      parseModelReply(reply, 'Systems Engineer'),
    );
  });

  it('honours a custom expected count', () => {
    const result = parseModelReply(JSON.stringify(makePairs(3)), 'SRE', 2);

    expect(result.status).toBe('success');
    expect(result.totalQuestions).toBe(2);
  });

  it('rejects a non-positive expected count', () => {
    expect(() => parseModelReply('[]', 'SRE', 0)).toThrow(RangeError);
  });
});

describe('parseStrict', () => {
  it('accepts an object wrapping the list', () => {
    const reply = JSON.stringify({ questions_and_answers: makePairs(2) });

    expect(parseStrict(reply)).toEqual(makePairs(2));
  });

  it('matches field names case-insensitively', () => {
    expect(parseStrict('[{"Question":"What is CI?","Answer":"Continuous integration."}]')).toEqual([
      { question: 'What is CI?', answer: 'Continuous integration.' },
    ]);
  });

  it('does not match invalid JSON or lists without valid pairs', () => {
    expect(parseStrict('not json')).toBeNull();
    expect(parseStrict('[{"prompt":"x"}]')).toBeNull();
    expect(parseStrict('{"status":"ok"}')).toBeNull();
  });
});

describe('parseLenient', () => {
  it('removes trailing commas', () => {
    expect(parseLenient('[{"question":"What is SQL?","answer":"A query language.",},]')).toEqual([
      { question: 'What is SQL?', answer: 'A query language.' },
    ]);
  });

  it('reads a fence whose closing marker is missing', () => {
    const reply = '```json\n[{"question":"What is DNS?","answer":"Name resolution."}]';

    expect(parseLenient(reply)).toEqual([{ question: 'What is DNS?', answer: 'Name resolution.' }]);
  });

  it('skips bracketed prose before the JSON', () => {
    const outcome = parseReply(`Here are 5 Q&A pairs [JSON]:\n${JSON.stringify(makePairs(5))}`, 'Analyst');

    expect(outcome.strategy).toBe('lenient');
    expect(outcome.result.status).toBe('success');
    expect(outcome.result.pairs).toEqual(makePairs(5));
  });

  it('ignores bracketed prose after the JSON', () => {
    const reply = `${JSON.stringify(makePairs(5))}\nNote: answers are samples [edit as needed].`;

    const outcome = parseReply(reply, 'Analyst');

    expect(outcome.strategy).toBe('lenient');
    expect(outcome.result.status).toBe('success');
    expect(outcome.result.pairs).toEqual(makePairs(5));
  });

  it('does not count brackets inside string values', () => {
    const reply = 'Sure: [{"question":"What does [] mean?","answer":"An array type, as in string[]."}] Done {ok}';

    expect(parseLenient(reply)).toEqual([
      { question: 'What does [] mean?', answer: 'An array type, as in string[].' },
    ]);
  });

  it('does not match text without brackets', () => {
    expect(parseLenient('1. What is DNS?\nName resolution.')).toBeNull();
  });
});

describe('parseHeuristic', () => {
  it('pairs numbered and labelled questions with the lines that follow', () => {
    const reply = [
      'Here are your questions:',
      '',
      '1. What is polymorphism?',
      'Answer: The ability of objects to take many forms.',
      '',
      '2. Explain the event loop.',
      'It schedules callbacks.',
      'It runs on a single thread.',
      '',
      'Question 3: Why do you want this job?',
      'A: I enjoy building products.',
    ].join('\n');

    const outcome = parseReply(reply, 'Frontend Engineer');

    expect(outcome.strategy).toBe('heuristic');
    expect(outcome.result.status).toBe('partial');
    expect(outcome.result.pairs).toEqual([
      { question: 'What is polymorphism?', answer: 'The ability of objects to take many forms.' },
      { question: 'Explain the event loop.', answer: 'It schedules callbacks. It runs on a single thread.' },
      { question: 'Why do you want this job?', answer: 'I enjoy building products.' },
    ]);
  });

  it('understands markdown emphasis around labels', () => {
    const reply = '**Question 1:** What is a closure?\n**Answer:** A function bundled with its lexical scope.';

    expect(parseHeuristic(reply)).toEqual([
      { question: 'What is a closure?', answer: 'A function bundled with its lexical scope.' },
    ]);
  });

  it('takes the question from the line after a bare label', () => {
    const reply = '### Question 1\n\nWhat is a deadlock?\n\nAnswer:\nTwo threads waiting on each other.';

    expect(parseHeuristic(reply)).toEqual([
      { question: 'What is a deadlock?', answer: 'Two threads waiting on each other.' },
    ]);
  });

  it('recovers pairs from truncated JSON', () => {
    const reply = [
      '[',
      '  {',
      '    "question": "What is TypeScript?",',
      '    "answer": "A typed superset of JavaScript."',
      '  },',
      '  {',
      '    "question": "What is a generic?",',
      '    "answer": "A type parameter',
    ].join('\n');

    const outcome = parseReply(reply, 'TypeScript Developer');

    expect(outcome.strategy).toBe('heuristic');
    expect(outcome.result.pairs).toEqual([
      { question: 'What is TypeScript?', answer: 'A typed superset of JavaScript.' },
      { question: 'What is a generic?', answer: 'A type parameter' },
    ]);
  });

  it('recovers pairs from compact truncated JSON', () => {
    const reply = '[{"question":"A?","answer":"a"},\n{"question":"B?","answer":"b"},\n{"question":"C?","ans';

    const outcome = parseReply(reply, 'Tester');

    expect(outcome.strategy).toBe('heuristic');
    expect(outcome.result.status).toBe('partial');
    expect(outcome.result.pairs).toEqual([
      { question: 'A?', answer: 'a' },
      { question: 'B?', answer: 'b' },
    ]);
  });

  it('reads every key on a line separately', () => {
    const reply = '{"question":"What is a queue?","answer":"FIFO."},{"question":"What is a stack?","answer":"LIFO."';

    expect(parseHeuristic(reply)).toEqual([
      { question: 'What is a queue?', answer: 'FIFO.' },
      { question: 'What is a stack?', answer: 'LIFO.' },
    ]);
  });

  it('takes an answer written on the question line', () => {
    const reply = '1. What is X? X is a thing.\n2. Why Go? Simplicity.';

    expect(parseHeuristic(reply)).toEqual([
      { question: 'What is X?', answer: 'X is a thing.' },
      { question: 'Why Go?', answer: 'Simplicity.' },
    ]);
  });

  it('drops questions that have no answer', () => {
    const reply = '1. What is X?\n2. What is Y?\nY is the second letter from the end.';

    expect(parseHeuristic(reply)).toEqual([
      { question: 'What is Y?', answer: 'Y is the second letter from the end.' },
    ]);
  });

  it('does not match an empty reply', () => {
    expect(parseHeuristic('')).toBeNull();
  });
});
