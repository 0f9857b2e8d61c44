import {
  AlignedSegment,
  Segment,
  SpeakerAssignment,
  SpeakerTurn,
  Word,
} from '../../database/entities';
import { assignSpeakers, segmentSpeaker } from './diarization-merger';

// 这些语言的词之间不加空格
const UNSPACED_LANGUAGES = new Set(['zh', 'ja', 'th', 'lo', 'my', 'km', 'yue']);

export function joinWords(words: Word[], language: string | null): string {
  const base = (language ?? '').toLowerCase().split(/[-_]/)[0];
  const separator = UNSPACED_LANGUAGES.has(base) ? '' : ' ';
  return words
    .map((w) => w.text.trim())
    .filter((t) => t.length > 0)
    .join(separator);
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * 规范化对齐结果，使其成为后续阶段的权威时间轴：
 * - 丢弃空文本或时间戳无效的词
 * - 置信度限制在 [0, 1]，end < start 时取 end = start
 * - 保证词在时间上单调且互不重叠
 * - 丢弃没有词的分段
 */
export function normalizeAlignedSegments(segments: AlignedSegment[]): AlignedSegment[] {
  const result: AlignedSegment[] = [];
  let prev: Word | null = null;

  for (const segment of segments) {
    const words: Word[] = [];

    for (const raw of segment.words) {
      const text = raw.text.trim();
      if (!text || !Number.isFinite(raw.start) || !Number.isFinite(raw.end)) continue;

      let start = raw.start;
      let end = Math.max(raw.start, raw.end);

      if (prev && start < prev.start) {
        start = prev.start;
        end = Math.max(end, start);
      }

      if (prev && prev.end > start) {
        // prev 可能属于上一个分段，直接替换其中的对象
        const trimmed: Word = { ...prev, end: start };
        replaceLast(result, words, trimmed);
        prev = trimmed;
      }

      const word: Word = { text, start, end, confidence: clampConfidence(raw.confidence) };
      words.push(word);
      prev = word;
    }

    if (words.length > 0) {
      result.push({ text: segment.text.trim(), words });
    }
  }

  return result;
}

function replaceLast(done: AlignedSegment[], current: Word[], word: Word): void {
  if (current.length > 0) {
    current[current.length - 1] = word;
    return;
  }
  const last = done[done.length - 1];
  if (last) {
    last.words[last.words.length - 1] = word;
  }
}

export interface SegmentDraft {
  text: string;
  assignments: SpeakerAssignment[];
  translated_text?: string | null;
  refinement_partial?: boolean;
}

/**
 * 由一段连续的词构建片段；时间戳只取自词本身
 */
export function buildSegment(id: number, draft: SegmentDraft): Segment {
  const words = draft.assignments.map((a) => a.word);
  if (words.length === 0) {
    throw new Error('Cannot build a segment without words');
  }

  const confidence = words.reduce((sum, w) => sum + w.confidence, 0) / words.length;

  return {
    id,
    start: words[0].start,
    end: words[words.length - 1].end,
    text: draft.text,
    words,
    speaker_id: segmentSpeaker(draft.assignments),
    confidence,
    translated_text: draft.translated_text ?? null,
    refinement_partial: draft.refinement_partial ?? false,
  };
}

export function renumber(segments: Segment[]): Segment[] {
  return segments.map((segment, id) => (segment.id === id ? segment : { ...segment, id }));
}

/**
 * 在说话人变化处切分一段词（两侧都有说话人时才切分）
 */
function splitBySpeaker(assignments: SpeakerAssignment[]): SpeakerAssignment[][] {
  const groups: SpeakerAssignment[][] = [];
  let current: SpeakerAssignment[] = [];
  let currentSpeaker: string | null = null;

  for (const assignment of assignments) {
    const speaker = assignment.speaker_id;
    if (current.length > 0 && speaker !== null && currentSpeaker !== null && speaker !== currentSpeaker) {
      groups.push(current);
      current = [];
      currentSpeaker = null;
    }
    current.push(assignment);
    if (speaker !== null) currentSpeaker = speaker;
  }

  if (current.length > 0) groups.push(current);
  return groups;
}

export interface BaseTranscript {
  assignments: SpeakerAssignment[];
  segments: Segment[];
}

/**
 * 构建未经 LLM 精修的字幕（ASR 分段 + 说话人）
 * segments 按顺序完整覆盖 assignments 中的每个词
 */
export function buildBaseSegments(
  aligned: AlignedSegment[],
  turns: SpeakerTurn[],
  language: string | null,
): BaseTranscript {
  const words = aligned.flatMap((s) => s.words);
  const assignments = assignSpeakers(words, turns);

  const segments: Segment[] = [];
  let offset = 0;

  for (const source of aligned) {
    const slice = assignments.slice(offset, offset + source.words.length);
    offset += source.words.length;

    const groups = splitBySpeaker(slice);
    for (const group of groups) {
      const text =
        groups.length === 1 && source.text
          ? source.text
          : joinWords(
              group.map((a) => a.word),
              language,
            );
      segments.push(buildSegment(segments.length, { text, assignments: group }));
    }
  }

  return { assignments, segments };
}
