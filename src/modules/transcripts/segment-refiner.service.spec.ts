import { ConfigService } from '@nestjs/config';
import { LLMError } from '../../common/errors/pipeline.errors';
import { AlignedSegment, RefinementOptions, SpeakerTurn, Word } from '../../database/entities';
import { LlmClient } from '../pipeline/pipeline.interfaces';
import { RefineCandidate } from './reanchor';
import { buildBaseSegments } from './segment-builder';
import { SegmentRefinerService } from './segment-refiner.service';

class FakeLlmClient implements LlmClient {
  readonly requests: Array<{ transcript: string; instruction: string }> = [];

  constructor(private readonly responses: Array<RefineCandidate[] | Error>) {}

  isAvailable(): boolean {
    return true;
  }

  async refine(transcript: string, instruction: string): Promise<RefineCandidate[]> {
    const response = this.responses[Math.min(this.requests.length, this.responses.length - 1)];
    this.requests.push({ transcript, instruction });
    if (response instanceof Error) throw response;
    return response;
  }
}

class AbortingLlmClient implements LlmClient {
  calls = 0;

  constructor(
    private readonly controller: AbortController,
    private readonly failWith: Error | null,
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async refine(): Promise<RefineCandidate[]> {
    this.calls++;
    this.controller.abort(new Error('refine timed out after 100ms'));
    if (this.failWith) throw this.failWith;
    return [{ text: 'Hello world.', translation: null }];
  }
}

function word(text: string, start: number, end: number): Word {
  return { text, start, end, confidence: 0.9 };
}

function createRefiner(llm: LlmClient, batchSize = 40): SegmentRefinerService {
  const config = new ConfigService({
    refinement: { maxRetries: 2, retryDelayMs: 0, anchorThreshold: 0.6, maxGapWords: 3, batchSize },
  });
  return new SegmentRefinerService(llm, config);
}

const options: RefinementOptions = {
  semantic_segmentation: true,
  error_correction: true,
  expression_optimization: false,
  translate_to: null,
};

const aligned: AlignedSegment[] = [
  { text: 'hello world', words: [word('hello', 0, 0.5), word('world', 0.5, 1)] },
  { text: 'how are you', words: [word('how', 1.2, 1.5), word('are', 1.5, 1.8), word('you', 1.8, 2)] },
];
const turns: SpeakerTurn[] = [{ speaker_id: 'S0', start: 0, end: 2 }];

describe('SegmentRefinerService', () => {
  it('should keep the original end when the candidate adds words', async () => {
    const base = buildBaseSegments(
      [{ text: 'Hi there', words: [word('Hi', 0, 0.3), word('there', 0.3, 0.6)] }],
      [{ speaker_id: 'S0', start: 0, end: 1 }],
      'en',
    );
    const refiner = createRefiner(new FakeLlmClient([[{ text: 'Hi there friend', translation: null }]]));

    const result = await refiner.refine(base.segments, base.assignments, options, 'en');

    expect(result.partial).toBe(true);
    expect(result.degraded).toBe(false);
    expect(result.segments).toHaveLength(1);
    expect(result.segments[0]).toMatchObject({
      id: 0,
      start: 0,
      end: 0.6,
      text: 'Hi there friend',
      speaker_id: 'S0',
      refinement_partial: true,
    });
  });

  it('should merge segments using source word timings only', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([[{ text: 'Hello world, how are you?', translation: null }]]);

    const result = await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(result.segments).toHaveLength(1);
    expect(result.segments[0]).toMatchObject({ start: 0, end: 2, text: 'Hello world, how are you?', refinement_partial: false });
    expect(result.segments[0].words).toHaveLength(5);

    const sourceTimes = new Set(aligned.flatMap((s) => s.words.flatMap((w) => [w.start, w.end])));
    for (const segment of result.segments) {
      expect(sourceTimes.has(segment.start)).toBe(true);
      expect(sourceTimes.has(segment.end)).toBe(true);
    }
  });

  it('should send the serialized transcript and instruction to the LLM', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([
      [
        { text: 'Hello world.', translation: null },
        { text: 'How are you?', translation: null },
      ],
    ]);

    await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(llm.requests).toHaveLength(1);
    expect(JSON.parse(llm.requests[0].transcript)).toEqual([
      { i: 0, s: 0, e: 1, t: 'hello world', sp: 'S0' },
      { i: 1, s: 1.2, e: 2, t: 'how are you', sp: 'S0' },
    ]);
    expect(llm.requests[0].instruction).toContain('Fix obvious speech recognition errors');
  });

  it('should attach translations only when a target language is set', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const candidates = [
      { text: 'Hello world.', translation: 'Bonjour le monde.' },
      { text: 'How are you?', translation: 'Comment ça va ?' },
    ];

    const translated = await createRefiner(new FakeLlmClient([candidates])).refine(
      base.segments,
      base.assignments,
      { ...options, translate_to: 'fr' },
      'en',
    );
    const untranslated = await createRefiner(new FakeLlmClient([candidates])).refine(
      base.segments,
      base.assignments,
      options,
      'en',
    );

    expect(translated.segments.map((s) => s.translated_text)).toEqual(['Bonjour le monde.', 'Comment ça va ?']);
    expect(untranslated.segments.map((s) => s.translated_text)).toEqual([null, null]);
  });

  it('should fall back to the original segments when candidates cannot be anchored', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([[{ text: 'something entirely unrelated', translation: null }]]);

    const result = await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(result.degraded).toBe(false);
    expect(result.partial).toBe(true);
    expect(result.segments.map((s) => [s.text, s.start, s.end, s.refinement_partial])).toEqual([
      ['hello world', 0, 1, true],
      ['how are you', 1.2, 2, true],
    ]);
  });

  it('should retry LLM errors and degrade after the retries are exhausted', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([new LLMError('timeout', 'request timed out')]);

    const result = await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(llm.requests).toHaveLength(3);
    expect(result.degraded).toBe(true);
    expect(result.errors).toEqual(['timeout: request timed out']);
    expect(result.segments).toEqual(base.segments);
  });

  it('should recover when a retry succeeds', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([
      new LLMError('malformed_response', 'not JSON'),
      [{ text: 'Hello world, how are you?', translation: null }],
    ]);

    const result = await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(llm.requests).toHaveLength(2);
    expect(result.degraded).toBe(false);
    expect(result.segments).toHaveLength(1);
  });

  it('should not retry when the LLM is unavailable', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([new LLMError('unavailable', 'no API key')]);

    const result = await createRefiner(llm).refine(base.segments, base.assignments, options, 'en');

    expect(llm.requests).toHaveLength(1);
    expect(result.degraded).toBe(true);
  });

  it('should degrade only the failing batch', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([
      [{ text: 'Hello world!', translation: null }],
      new LLMError('rate_limited', 'slow down'),
    ]);

    const result = await createRefiner(llm, 1).refine(base.segments, base.assignments, options, 'en');

    expect(result.degraded).toBe(true);
    expect(result.segments.map((s) => [s.id, s.text])).toEqual([
      [0, 'Hello world!'],
      [1, 'how are you'],
    ]);
  });

  it('should propagate unexpected errors', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const llm = new FakeLlmClient([new Error('boom')]);

    await expect(createRefiner(llm).refine(base.segments, base.assignments, options, 'en')).rejects.toThrow('boom');
    expect(llm.requests).toHaveLength(1);
  });

  it('should not start another batch once the signal aborts', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const controller = new AbortController();
    const llm = new AbortingLlmClient(controller, null);

    await expect(
      createRefiner(llm, 1).refine(base.segments, base.assignments, options, 'en', controller.signal),
    ).rejects.toThrow('refine timed out after 100ms');
    expect(llm.calls).toBe(1);
  });

  it('should not retry a failed call once the signal aborts', async () => {
    const base = buildBaseSegments(aligned, turns, 'en');
    const controller = new AbortController();
    const llm = new AbortingLlmClient(controller, new LLMError('timeout', 'request timed out'));

    await expect(
      createRefiner(llm).refine(base.segments, base.assignments, options, 'en', controller.signal),
    ).rejects.toThrow('refine timed out after 100ms');
    expect(llm.calls).toBe(1);
  });

  it('should return an empty result for an empty transcript', async () => {
    const llm = new FakeLlmClient([[]]);

    const result = await createRefiner(llm).refine([], [], options);

    expect(result).toEqual({ segments: [], degraded: false, partial: false, errors: [] });
    expect(llm.requests).toHaveLength(0);
  });
});
