import { Logger } from '@nestjs/common';
import { SpeakerAssignment, SpeakerTurn, Word } from '../../database/entities';

const logger = new Logger('DiarizationMerger');

const EPSILON = 1e-9;

function overlapOf(word: Word, turn: SpeakerTurn): number {
  return Math.min(word.end, turn.end) - Math.max(word.start, turn.start);
}

/**
 * 零时长的词没有可比较的重叠时长，只要落在发言区间内即视为命中
 */
function intersects(word: Word, turn: SpeakerTurn, overlap: number): boolean {
  if (word.end - word.start <= EPSILON) {
    return turn.start <= word.start && word.start <= turn.end;
  }
  return overlap > EPSILON;
}

/**
 * 整理发言列表：按开始时间稳定排序，并记录重叠（说话人分离的数据错误）
 */
function prepareTurns(turns: SpeakerTurn[]): SpeakerTurn[] {
  let sorted = turns;
  for (let i = 1; i < turns.length; i++) {
    if (turns[i].start < turns[i - 1].start) {
      logger.warn(`Speaker turns are not sorted by start, sorting ${turns.length} turns`);
      sorted = [...turns].sort((a, b) => a.start - b.start);
      break;
    }
  }

  let overlaps = 0;
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].start < sorted[i - 1].end - EPSILON) {
      overlaps++;
    }
  }
  if (overlaps > 0) {
    logger.warn(`Found ${overlaps} overlapping speaker turns, resolving by maximum overlap`);
  }

  return sorted;
}

/**
 * 为每个词分配说话人
 *
 * 选择与词区间重叠时长最大的发言；时长相同时取开始时间最早的发言；
 * 没有任何发言覆盖的词（静音 / 分离空隙）说话人为 null。
 *
 * 词和发言都按时间排序，采用双指针扫描：
 * 只有当游标所指发言在词开始之前结束时才推进游标。
 */
export function assignSpeakers(words: Word[], turns: SpeakerTurn[]): SpeakerAssignment[] {
  if (turns.length === 0) {
    return words.map((word) => ({ word, speaker_id: null, overlap: 0 }));
  }

  const sorted = prepareTurns(turns);
  let cursor = 0;

  return words.map((word) => {
    while (cursor < sorted.length && sorted[cursor].end < word.start) {
      cursor++;
    }

    let best: SpeakerTurn | null = null;
    let bestOverlap = 0;

    // 发言互不重叠时，这里通常只会检查一到两个发言
    for (let j = cursor; j < sorted.length && sorted[j].start <= word.end; j++) {
      const turn = sorted[j];
      const overlap = overlapOf(word, turn);
      if (!intersects(word, turn, overlap)) continue;

      if (best === null || overlap > bestOverlap + EPSILON) {
        best = turn;
        bestOverlap = Math.max(overlap, 0);
      }
    }

    return {
      word,
      speaker_id: best ? best.speaker_id : null,
      overlap: bestOverlap,
    };
  });
}

/**
 * 片段级说话人：按重叠时长加权的多数（不是按词数）
 * 平票时取片段第一个词的说话人；没有任何带说话人的词时为 null
 */
export function segmentSpeaker(assignments: SpeakerAssignment[]): string | null {
  const totals = new Map<string, number>();
  for (const { speaker_id, overlap } of assignments) {
    if (speaker_id === null) continue;
    totals.set(speaker_id, (totals.get(speaker_id) ?? 0) + overlap);
  }

  if (totals.size === 0) {
    return null;
  }

  let max = -Infinity;
  for (const total of totals.values()) {
    max = Math.max(max, total);
  }

  const tied = new Set<string>();
  for (const [speaker, total] of totals) {
    if (max - total <= EPSILON) tied.add(speaker);
  }

  const first = assignments[0]?.speaker_id ?? null;
  if (first !== null && tied.has(first)) {
    return first;
  }

  // 首词无说话人（或不在平票之列）时，按词序取第一个平票说话人
  for (const { speaker_id } of assignments) {
    if (speaker_id !== null && tied.has(speaker_id)) {
      return speaker_id;
    }
  }
  return null;
}
