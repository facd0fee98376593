import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  ClassifierChain,
  LengthHeuristicClassifier,
  LlmJobDescriptionClassifier,
  createJobDescriptionClassifier,
  parseVerdict,
  type ClassifierLink,
} from './classifier';
import { ClassificationParseError, GenerationError } from './errors';
import { FakeGenerator, SOFTWARE_ENGINEER_JD, words } from '@/__tests__/mocks/generator.mock';

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('LengthHeuristicClassifier', () => {
  it('rejects text under 40 words as too short', async () => {
    const link = new LengthHeuristicClassifier();
    expect(await link.tryClassify(words(39))).toEqual({ isValid: false, reason: 'too short' });
  });

  it('passes 40 words on to the next link', async () => {
    const link = new LengthHeuristicClassifier();
    expect(await link.tryClassify(words(40))).toBeNull();
  });
});

describe('parseVerdict', () => {
  it('reads a plain JSON verdict', () => {
    expect(parseVerdict('{"is_valid": true, "reason": "Describes a backend role."}')).toEqual({
      isValid: true,
      reason: 'Describes a backend role.',
    });
  });

  it('strips markdown code fences', () => {
    const raw = '```json\n{"is_valid": false, "reason": "This is a resume."}\n```';
    expect(parseVerdict(raw)).toEqual({ isValid: false, reason: 'This is a resume.' });
  });

  it('finds the object inside surrounding chatter', () => {
    const raw = 'Sure! Here you go: {"is_valid": true, "reason": "Real posting."} Hope that helps.';
    expect(parseVerdict(raw)).toEqual({ isValid: true, reason: 'Real posting.' });
  });

  it('throws on an empty response', () => {
    expect(() => parseVerdict('')).toThrow(ClassificationParseError);
    expect(() => parseVerdict('   ')).toThrow('Job description check returned an empty response.');
  });

  it('throws on text that is not JSON', () => {
    expect(() => parseVerdict('yes, it is a job posting')).toThrow(
      'Job description check returned something that is not JSON.'
    );
  });

  it('throws on malformed JSON', () => {
    expect(() => parseVerdict('{"is_valid": true, "reason": }')).toThrow(
      'Job description check returned malformed JSON.'
    );
  });

  it('names the missing or mistyped fields', () => {
    expect(() => parseVerdict('{"reason": "ok"}')).toThrow(
      'Job description check response is missing or has invalid fields: is_valid.'
    );
    expect(() => parseVerdict('{"is_valid": "true", "reason": ""}')).toThrow(
      'Job description check response is missing or has invalid fields: is_valid, reason.'
    );
  });
});

describe('LlmJobDescriptionClassifier', () => {
  it('sends a JSON request at temperature 0 and returns the verdict', async () => {
    const generator = new FakeGenerator('{"is_valid": true, "reason": "A software engineering posting."}');
    const link = new LlmJobDescriptionClassifier(generator);

    const verdict = await link.tryClassify(SOFTWARE_ENGINEER_JD);

    expect(verdict).toEqual({ isValid: true, reason: 'A software engineering posting.' });
    expect(generator.calls).toHaveLength(1);
    expect(generator.calls[0].temperature).toBe(0);
    expect(generator.calls[0].json).toBe(true);
    expect(generator.calls[0].system).toContain('strict recruiter');
    expect(generator.calls[0].user).toContain(SOFTWARE_ENGINEER_JD);
  });

  it('fails closed on a malformed response', async () => {
    const link = new LlmJobDescriptionClassifier(new FakeGenerator('not json at all'));

    expect(await link.tryClassify(SOFTWARE_ENGINEER_JD)).toEqual({
      isValid: false,
      reason: 'Job description check returned something that is not JSON.',
    });
  });

  it('fails closed on a response with a missing field', async () => {
    const link = new LlmJobDescriptionClassifier(new FakeGenerator('{"reason": "looks fine"}'));

    expect(await link.tryClassify(SOFTWARE_ENGINEER_JD)).toEqual({
      isValid: false,
      reason: 'Job description check response is missing or has invalid fields: is_valid.',
    });
  });

  it('rethrows a failure caused by a cancelled request instead of judging the text', async () => {
    const controller = new AbortController();
    controller.abort();
    const link = new LlmJobDescriptionClassifier(new FakeGenerator(new GenerationError('Request was aborted.')));

    await expect(link.tryClassify(SOFTWARE_ENGINEER_JD, { signal: controller.signal })).rejects.toThrow(
      'Request was aborted.'
    );
  });

  it('fails closed when the service call fails', async () => {
    const link = new LlmJobDescriptionClassifier(new FakeGenerator(new GenerationError('Request timed out.')));

    expect(await link.tryClassify(SOFTWARE_ENGINEER_JD)).toEqual({
      isValid: false,
      reason: 'Job description check failed: Request timed out.',
    });
  });
});

describe('ClassifierChain', () => {
  it('short-circuits short text without calling the service', async () => {
    const generator = new FakeGenerator('{"is_valid": true, "reason": "never asked"}');
    const classifier = createJobDescriptionClassifier(generator);

    const verdict = await classifier.classify('lorem ipsum dolor sit');

    expect(verdict).toEqual({ isValid: false, reason: 'too short' });
    expect(generator.calls).toHaveLength(0);
  });

  it('falls through to the model for long enough text', async () => {
    const generator = new FakeGenerator('{"is_valid": false, "reason": "This is a news article."}');
    const classifier = createJobDescriptionClassifier(generator);

    const verdict = await classifier.classify(words(45));

    expect(verdict).toEqual({ isValid: false, reason: 'This is a news article.' });
    expect(generator.calls).toHaveLength(1);
  });

  it('fails closed when no link decides', async () => {
    const undecided: ClassifierLink = { name: 'undecided', tryClassify: async () => null };
    const chain = new ClassifierChain([undecided]);

    const verdict = await chain.classify(SOFTWARE_ENGINEER_JD);

    expect(verdict.isValid).toBe(false);
  });

  it('forwards the abort signal to every link', async () => {
    const seen: (AbortSignal | undefined)[] = [];
    const spy: ClassifierLink = {
      name: 'spy',
      tryClassify: async (_text, options) => {
        seen.push(options?.signal);
        return null;
      },
    };
    const controller = new AbortController();

    await new ClassifierChain([spy, spy]).classify('text', { signal: controller.signal });

    expect(seen).toEqual([controller.signal, controller.signal]);
  });
});
