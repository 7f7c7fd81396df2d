import { describe, test, expect, vi } from 'vitest';
import { composeAndRefine, parseCritique, refineDocument, type RefinementCollaborators } from '../RefinementDirector';
import { serializeCanvasDocument } from '../documentCodec';
import type { AssetDescriptor, CanvasDocument, Resolution } from '../../types/canvasTypes';
import { cleanLayout, makeDocument } from './fixtures';

const RESOLUTION: Resolution = [1080, 1080];
const BRIEF = 'Summer sale banner with a bold headline';
const ASSETS: AssetDescriptor[] = [{ type: 'background', url: 'https://assets.test/bg.png', description: 'Beach' }];
const QUIET = { verbose: false };

const VALID = serializeCanvasDocument(cleanLayout());
const RED_FILL = serializeCanvasDocument(makeDocument([{ type: 'rect', left: 0, top: 0, width: 100, height: 100, fill: 'red' }]));
const TWO_BAD_COLORS = serializeCanvasDocument(makeDocument([
  { type: 'rect', left: 0, top: 0, width: 100, height: 100, fill: 'red' },
  { type: 'rect', left: 500, top: 0, width: 100, height: 100, fill: 'blue' }
]));

const collaborators = (overrides: Partial<RefinementCollaborators> = {}): RefinementCollaborators => ({
  generateCandidate: vi.fn(async () => VALID),
  applyFeedback: vi.fn(async () => VALID),
  ...overrides
});

describe('parseCritique', () => {
  test.each([
    ['PASS', { verdict: 'pass' }],
    ['pass - looks great', { verdict: 'pass' }],
    ['CONTINUE: tighten the spacing', { verdict: 'continue', feedback: 'tighten the spacing' }],
    ['Make the logo larger', { verdict: 'continue', feedback: 'Make the logo larger' }],
    ['CONTINUE', { verdict: 'continue', feedback: 'Improve the overall layout quality.' }]
  ])('reads %j', (text, expected) => {
    expect(parseCritique(text)).toEqual(expected);
  });
});

describe('composeAndRefine', () => {
  test('stops after exactly five round trips with a critic that never passes', async () => {
    const critique = vi.fn(async () => 'CONTINUE: make the headline bigger');
    const applyFeedback = vi.fn(async () => VALID);
    const generateCandidate = vi.fn(async () => VALID);

    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, { generateCandidate, critique, applyFeedback }, QUIET);

    expect(outcome.status).toBe('exhausted');
    expect(outcome.iterations).toBe(5);
    expect(generateCandidate).toHaveBeenCalledTimes(1);
    expect(critique).toHaveBeenCalledTimes(5);
    expect(applyFeedback).toHaveBeenCalledTimes(5);
    expect(applyFeedback.mock.calls[0]).toEqual([cleanLayout(), 'make the headline bigger', BRIEF, ASSETS, RESOLUTION]);
    if (outcome.status === 'failed') return;
    expect(outcome.document.objects).toHaveLength(4);
    expect(outcome.violations).toEqual([]);
  });

  test('converges once a structurally valid candidate passes the critic', async () => {
    const critique = vi.fn(async () => 'PASS');
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators({ critique }), QUIET);
    expect(outcome.status).toBe('converged');
    expect(outcome.iterations).toBe(1);
    expect(critique).toHaveBeenCalledTimes(1);
  });

  test('converges on local repair alone without a critic', async () => {
    const keyed = serializeCanvasDocument(makeDocument([{
      type: 'rect', left: 1000, top: 0, width: 200, height: 100,
      fill: { type: 'linear', colorStops: { '0': '#FFFFFF', '1': '#000000' } }
    }]));
    const applyFeedback = vi.fn(async () => VALID);
    const outcome = await composeAndRefine(
      BRIEF, ASSETS, RESOLUTION,
      collaborators({ generateCandidate: vi.fn(async () => keyed), applyFeedback }),
      QUIET
    );

    expect(outcome.status).toBe('converged');
    expect(applyFeedback).not.toHaveBeenCalled();
    if (outcome.status === 'failed') return;
    expect(outcome.document.objects[0]).toMatchObject({
      left: 880,
      fill: { colorStops: [{ offset: 0, color: '#FFFFFF' }, { offset: 1, color: '#000000' }] }
    });
  });

  test('skips the critic in fast mode', async () => {
    const critique = vi.fn(async () => 'CONTINUE: never satisfied');
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators({ critique }), { ...QUIET, mode: 'fast' });
    expect(outcome.status).toBe('converged');
    expect(critique).not.toHaveBeenCalled();
  });

  test('treats a failing critic as acceptance', async () => {
    const critique = vi.fn(async (): Promise<string> => { throw new Error('critic offline'); });
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators({ critique }), QUIET);
    expect(outcome.status).toBe('converged');
    expect(outcome.trace.recoveredFailures).toBe(1);
  });

  test('fails when no candidate ever parses', async () => {
    const generateCandidate = vi.fn(async () => 'Sorry, I cannot help with that.');
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators({ generateCandidate }), QUIET);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'No parseable candidate after 3 attempt(s)', iterations: 0 });
    expect(generateCandidate).toHaveBeenCalledTimes(3);
  });

  test('retries composition until a candidate parses', async () => {
    const generateCandidate = vi.fn(async () => VALID).mockRejectedValueOnce(new Error('503 Overloaded'));
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators({ generateCandidate }), QUIET);
    expect(outcome.status).toBe('converged');
    expect(generateCandidate).toHaveBeenCalledTimes(2);
  });

  test('rejects an invalid resolution before composing', async () => {
    const generateCandidate = vi.fn(async () => VALID);
    const outcome = await composeAndRefine(BRIEF, ASSETS, [0, 1080], collaborators({ generateCandidate }), QUIET);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'Invalid resolution 0x1080' });
    expect(generateCandidate).not.toHaveBeenCalled();
  });

  test('records state transitions in order', async () => {
    const outcome = await composeAndRefine(BRIEF, ASSETS, RESOLUTION, collaborators(), QUIET);
    expect(outcome.trace.transitions.map(t => t.state)).toEqual(['COMPOSING', 'VALIDATING', 'DONE']);
  });
});

describe('refineDocument', () => {
  const context = { brief: BRIEF, assets: ASSETS, resolution: RESOLUTION };
  const redFill = (): CanvasDocument => makeDocument([{ type: 'rect', left: 0, top: 0, width: 100, height: 100, fill: 'red' }]);

  test('sends judgment violations back as feedback', async () => {
    const applyFeedback = vi.fn(async (_document: CanvasDocument, _feedback: string) => VALID);
    const outcome = await refineDocument(redFill(), context, collaborators({ applyFeedback }), QUIET);

    expect(applyFeedback.mock.calls[0][1]).toBe(
      'The layout has 1 validation issue(s) that must be fixed:\n' +
      '- [color] $.objects[0].fill: Color "red" is not #RRGGBB or rgba(r,g,b[,a]).'
    );
    expect(outcome).toMatchObject({ status: 'converged', iterations: 2 });
  });

  test('repairs geometry locally even when a color violation needs feedback', async () => {
    const overflowing = makeDocument([{ type: 'rect', left: 900, top: 0, width: 300, height: 100, fill: 'red' }]);
    const applyFeedback = vi.fn(async (_document: CanvasDocument, _feedback: string) => 'no layout today');
    const outcome = await refineDocument(overflowing, context, collaborators({ applyFeedback }), QUIET);

    expect(applyFeedback.mock.calls[0][0].objects[0].left).toBe(780);
    expect(applyFeedback.mock.calls[0][1]).toBe(
      'The layout has 1 validation issue(s) that must be fixed:\n' +
      '- [color] $.objects[0].fill: Color "red" is not #RRGGBB or rgba(r,g,b[,a]).'
    );
    expect(outcome.status).toBe('exhausted');
    expect(outcome.violations.map(v => v.code)).toEqual(['INVALID_COLOR']);
    if (outcome.status === 'failed') return;
    expect(outcome.document.objects[0].left).toBe(780);
  });

  test('keeps the previous candidate when a revision does not parse', async () => {
    const applyFeedback = vi.fn(async () => VALID).mockResolvedValueOnce('I cannot do that');
    const outcome = await refineDocument(redFill(), context, collaborators({ applyFeedback }), QUIET);

    expect(applyFeedback).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({ status: 'converged', iterations: 3 });
    expect(outcome.trace.recoveredFailures).toBe(1);
  });

  test('returns the best candidate when every revision fails', async () => {
    const applyFeedback = vi.fn(async (): Promise<string> => { throw new Error('model unavailable'); });
    const outcome = await refineDocument(redFill(), context, collaborators({ applyFeedback }), QUIET);

    expect(applyFeedback).toHaveBeenCalledTimes(5);
    expect(outcome.status).toBe('exhausted');
    expect(outcome.violations.map(v => v.code)).toEqual(['INVALID_COLOR']);
    if (outcome.status === 'failed') return;
    expect(outcome.document).toEqual(redFill());
  });

  test('prefers the candidate with fewer violations over a worse revision', async () => {
    const applyFeedback = vi.fn(async () => TWO_BAD_COLORS);
    const outcome = await refineDocument(redFill(), context, collaborators({ applyFeedback }), QUIET);

    expect(outcome.status).toBe('exhausted');
    expect(outcome.violations).toHaveLength(1);
  });

  test('honours a lower iteration cap', async () => {
    const applyFeedback = vi.fn(async () => RED_FILL);
    const outcome = await refineDocument(redFill(), context, collaborators({ applyFeedback }), { ...QUIET, maxIterations: 2 });
    expect(outcome.iterations).toBe(2);
    expect(applyFeedback).toHaveBeenCalledTimes(2);
  });

  test('fails on an invalid resolution without calling collaborators', async () => {
    const applyFeedback = vi.fn(async () => VALID);
    const outcome = await refineDocument(redFill(), { ...context, resolution: [1080, -1] }, collaborators({ applyFeedback }), QUIET);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'Invalid resolution 1080x-1', iterations: 0 });
    expect(applyFeedback).not.toHaveBeenCalled();
  });
});
