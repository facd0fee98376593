import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SHORT_RESUME_MESSAGE, analyzeSession, parseInputs, type PipelineDeps } from './pipeline';
import { createJobDescriptionClassifier } from './classifier';
import { COMPARISON_SECTIONS } from './prompts';
import { SessionContext } from './session';
import { ExtractionError, GenerationError, InputError, NotReadyError } from './errors';
import { FakeGenerator, SOFTWARE_ENGINEER_JD } from '@/__tests__/mocks/generator.mock';
import type { CompletionRequest } from './openai';

const LONG_RESUME = 'Experienced engineer with a track record of shipping TypeScript services. '.repeat(4).trim();
const SHORT_RESUME = 'Jane Doe Software Engineer jane@example.com Remote';
const REPORT = COMPARISON_SECTIONS.map((s, i) => `${i + 1}) **${s}**\n- point`).join('\n\n');

const modelReplies = (verdictJson: string, report = REPORT) => (request: CompletionRequest) =>
  request.json ? verdictJson : report;

const VALID = '{"is_valid": true, "reason": "A backend engineering posting."}';

function setup(resumeText = LONG_RESUME, reply: ReturnType<typeof modelReplies> = modelReplies(VALID)) {
  const generator = new FakeGenerator(reply);
  const extract = vi.fn<PipelineDeps['extract']>().mockResolvedValue({ text: resumeText, pages: 1 });
  const deps: PipelineDeps = {
    extract,
    classifier: createJobDescriptionClassifier(generator),
    generator,
    analysisTemperature: 0.3,
  };
  const session = new SessionContext('test-session');
  return { deps, extract, generator, session };
}

const pdf = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d]);

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('parseInputs', () => {
  it('parses a text resume and a real posting into a READY session', async () => {
    const { deps, generator, session } = setup();

    const outcome = await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });

    expect(outcome.readiness).toBe('READY');
    expect(outcome.verdict).toEqual({ isValid: true, reason: 'A backend engineering posting.' });
    expect(outcome.warnings).toEqual([]);
    expect(outcome.resume).toEqual({
      fileName: 'jane.pdf',
      pages: 1,
      characters: LONG_RESUME.length,
      preview: LONG_RESUME,
    });
    expect(generator.calls).toHaveLength(1);
    expect(session.snapshot.resumeText).toBe(LONG_RESUME);
    expect(session.snapshot.jobDescription).toBe(SOFTWARE_ENGINEER_JD);
  });

  it('warns about a short resume but keeps the text and still checks the JD', async () => {
    const { deps, generator, session } = setup(SHORT_RESUME);

    const outcome = await parseInputs(deps, session, { bytes: pdf, fileName: 'scan.pdf', jobDescription: SOFTWARE_ENGINEER_JD });

    expect(outcome.warnings).toEqual([{ kind: 'empty-or-short-resume', message: SHORT_RESUME_MESSAGE, characters: 50 }]);
    expect(session.snapshot.resumeText).toBe(SHORT_RESUME);
    expect(generator.calls).toHaveLength(1);
    expect(outcome.readiness).toBe('READY');
  });

  it('rejects a short JD locally and leaves the session PARSED', async () => {
    const { deps, generator, session } = setup();

    const outcome = await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: 'lorem ipsum dolor sit' });

    expect(outcome.verdict).toEqual({ isValid: false, reason: 'too short' });
    expect(outcome.readiness).toBe('PARSED');
    expect(generator.calls).toHaveLength(0);
  });

  it('normalizes the resume and only trims the JD', async () => {
    const { deps, session } = setup('  Jane\u200b Doe\n\n\n\nSkills:\t\tGo  ');
    const jd = `${SOFTWARE_ENGINEER_JD}\n\n\n\nApply now`;

    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: `  ${jd}\n` });

    expect(session.snapshot.resumeText).toBe('Jane Doe\n\nSkills: Go');
    expect(session.snapshot.jobDescription).toBe(jd);
  });

  it('requires a file and a JD before doing any work', async () => {
    const { deps, extract, session } = setup();

    await expect(
      parseInputs(deps, session, { bytes: null, fileName: '', jobDescription: SOFTWARE_ENGINEER_JD })
    ).rejects.toThrow(new InputError('Please upload a PDF resume first.'));
    await expect(parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: ' \n ' })).rejects.toThrow(
      'Please paste the job description.'
    );
    expect(extract).not.toHaveBeenCalled();
    expect(session.readiness).toBe('EMPTY');
  });

  it('keeps the previous snapshot when extraction fails', async () => {
    const { deps, extract, session } = setup();
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });
    extract.mockRejectedValueOnce(new ExtractionError('Could not read PDF: bad xref table'));

    await expect(
      parseInputs(deps, session, { bytes: pdf, fileName: 'broken.pdf', jobDescription: 'a different posting' })
    ).rejects.toBeInstanceOf(ExtractionError);

    expect(session.readiness).toBe('READY');
    expect(session.snapshot.fileName).toBe('jane.pdf');
    expect(session.snapshot.jobDescription).toBe(SOFTWARE_ENGINEER_JD);
  });

  it('keeps the READY snapshot when a re-parse is aborted during the JD check', async () => {
    const { deps, session } = setup(LONG_RESUME, (request) => {
      if (request.signal?.aborted) throw new GenerationError('Request was aborted.');
      return request.json ? VALID : REPORT;
    });
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });
    const before = session.snapshot;
    const controller = new AbortController();
    controller.abort();

    await expect(
      parseInputs(deps, session, { bytes: pdf, fileName: 'other.pdf', jobDescription: SOFTWARE_ENGINEER_JD }, controller.signal)
    ).rejects.toThrow('Request was aborted.');

    expect(session.readiness).toBe('READY');
    expect(session.snapshot).toBe(before);
  });

  it('does not publish when the request is aborted after the JD check returned', async () => {
    const controller = new AbortController();
    const { deps, session } = setup(LONG_RESUME, (request) => {
      controller.abort();
      return request.json ? VALID : REPORT;
    });

    await expect(
      parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD }, controller.signal)
    ).rejects.toBe(controller.signal.reason);

    expect(session.readiness).toBe('EMPTY');
    expect(session.snapshot.fileName).toBeNull();
  });

  it('passes the abort signal to the JD check', async () => {
    const { deps, generator, session } = setup();
    const controller = new AbortController();

    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD }, controller.signal);

    expect(generator.calls[0].signal).toBe(controller.signal);
  });
});

describe('analyzeSession', () => {
  it('returns the comparison report for a READY session', async () => {
    const { deps, generator, session } = setup();
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });

    const result = await analyzeSession(deps, session);

    expect(result.mode).toBe('comparison');
    expect(result.markdown).toBe(REPORT);
    for (const section of COMPARISON_SECTIONS) {
      expect(result.markdown).toContain(`**${section}**`);
    }
    expect(generator.calls).toHaveLength(2);
    expect(generator.calls[1].temperature).toBe(0.3);
    expect(generator.calls[1].json).toBeUndefined();
    expect(generator.calls[1].user).toContain(LONG_RESUME);
  });

  it('refuses a session whose JD failed validation, without calling the model', async () => {
    const { deps, generator, session } = setup();
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: 'lorem ipsum dolor sit' });

    const attempt = analyzeSession(deps, session);

    await expect(attempt).rejects.toBeInstanceOf(NotReadyError);
    await expect(attempt).rejects.toThrow(
      "The job description didn't pass validation (too short). Fix it and parse again."
    );
    expect(generator.calls).toHaveLength(0);
  });

  it('refuses a session that was never parsed', async () => {
    const { deps, session } = setup();

    await expect(analyzeSession(deps, session)).rejects.toThrow(
      'Upload a PDF, paste the job description, and click Continue → Parse Resume first.'
    );
  });

  it('reports an empty model answer as a generation failure', async () => {
    const { deps, session } = setup(LONG_RESUME, modelReplies(VALID, ''));
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });

    await expect(analyzeSession(deps, session)).rejects.toThrow(new GenerationError('The model returned an empty report.'));
  });

  it('lets a failed model call propagate and leaves the session READY', async () => {
    const { deps, session } = setup();
    await parseInputs(deps, session, { bytes: pdf, fileName: 'jane.pdf', jobDescription: SOFTWARE_ENGINEER_JD });
    deps.generator = new FakeGenerator(new GenerationError('Request timed out.'));

    await expect(analyzeSession(deps, session)).rejects.toThrow('Request timed out.');
    expect(session.readiness).toBe('READY');
  });
});
