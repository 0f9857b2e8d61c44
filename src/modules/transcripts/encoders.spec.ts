import { OutputFormat, Segment } from '../../database/entities';
import {
  encodeJSON,
  encodeSRT,
  encodeTranscript,
  encodeVTT,
  formatSRTTime,
  formatVTTTime,
} from './encoders';

const segments: Segment[] = [
  {
    id: 0,
    start: 0,
    end: 1.5,
    text: 'Hello <world>',
    words: [
      { text: 'Hello', start: 0, end: 0.7, confidence: 0.9 },
      { text: '<world>', start: 0.7, end: 1.5, confidence: 0.8 },
    ],
    speaker_id: 'S0',
    confidence: 0.85,
    translated_text: 'Bonjour',
    refinement_partial: false,
  },
  {
    id: 1,
    start: 2,
    end: 3.25,
    text: 'Bye',
    words: [{ text: 'Bye', start: 2, end: 3.25, confidence: 1 }],
    speaker_id: null,
    confidence: 1,
    translated_text: null,
    refinement_partial: true,
  },
];

const options = { language: 'en', speakerLabels: true };

describe('timestamps', () => {
  it('should round to whole milliseconds', () => {
    expect(formatSRTTime(3661.0006)).toBe('01:01:01,001');
    expect(formatSRTTime(59.9996)).toBe('00:01:00,000');
    expect(formatVTTTime(0.0004)).toBe('00:00:00.000');
    expect(formatVTTTime(1.5)).toBe('00:00:01.500');
  });
});

describe('encodeSRT', () => {
  it('should prefix speakers and put translations on a second line', () => {
    expect(encodeSRT(segments, options)).toBe(
      '1\n00:00:00,000 --> 00:00:01,500\nS0: Hello <world>\nBonjour\n' +
        '\n' +
        '2\n00:00:02,000 --> 00:00:03,250\nBye\n',
    );
  });

  it('should omit speaker prefixes when labels are disabled', () => {
    const output = encodeSRT(segments.slice(0, 1), { ...options, speakerLabels: false });

    expect(output).toBe('1\n00:00:00,000 --> 00:00:01,500\nHello <world>\nBonjour\n');
  });
});

describe('encodeVTT', () => {
  it('should use voice tags and escape markup', () => {
    expect(encodeVTT(segments, options)).toBe(
      'WEBVTT\n\n' +
        '00:00:00.000 --> 00:00:01.500\n<v S0>Hello &lt;world&gt;\nBonjour\n' +
        '\n' +
        '00:00:02.000 --> 00:00:03.250\nBye\n',
    );
  });

  it('should emit only the header for an empty transcript', () => {
    expect(encodeVTT([], options)).toBe('WEBVTT\n\n');
  });
});

describe('multi-line text', () => {
  const multiline: Segment[] = [
    { ...segments[1], text: 'First line\n\nsecond line', translated_text: 'Erste\r\n  zweite\n' },
  ];

  it('should keep each SRT block free of blank lines', () => {
    expect(encodeSRT(multiline, options)).toBe(
      '1\n00:00:02,000 --> 00:00:03,250\nFirst line second line\nErste zweite\n',
    );
  });

  it('should keep each VTT cue free of blank lines', () => {
    expect(encodeVTT(multiline, options)).toBe(
      'WEBVTT\n\n00:00:02.000 --> 00:00:03.250\nFirst line second line\nErste zweite\n',
    );
  });
});

describe('encodeJSON', () => {
  it('should keep word-level data in a stable key order', () => {
    const parsed: unknown = JSON.parse(encodeJSON(segments, options));

    expect(parsed).toEqual({
      language: 'en',
      segments: segments.map((s) => ({
        id: s.id,
        start: s.start,
        end: s.end,
        text: s.text,
        speaker_id: s.speaker_id,
        confidence: s.confidence,
        translated_text: s.translated_text,
        refinement_partial: s.refinement_partial,
        words: s.words,
      })),
    });
    expect(encodeJSON(segments, options).split('\n')[2]).toBe('  "segments": [');
  });

  it('should produce byte-identical output on repeat', () => {
    const first = encodeJSON(segments, options);
    const second = encodeJSON(structuredClone(segments), options);

    expect(second).toBe(first);
    expect(first.endsWith('}\n')).toBe(true);
  });
});

describe('encodeTranscript', () => {
  it('should dispatch on the output format', () => {
    expect(encodeTranscript(OutputFormat.SRT, segments, options)).toBe(encodeSRT(segments, options));
    expect(encodeTranscript(OutputFormat.VTT, segments, options)).toBe(encodeVTT(segments, options));
    expect(encodeTranscript(OutputFormat.JSON, segments, options)).toBe(encodeJSON(segments, options));
  });
});
