import { AlignmentMismatchError } from '../../common/errors/pipeline.errors';
import { Word } from '../../database/entities';

/**
 * LLM 返回的候选片段（时间戳不可信，只取文本）
 */
export interface RefineCandidate {
  text: string;
  translation: string | null;
}

export interface AnchorSettings {
  /** Dice 相似度阈值：2·LCS / (候选 token 数 + 覆盖的原始 token 数) */
  threshold: number;
  /** 两个锚定片段之间允许并入相邻片段的最大未覆盖词数 */
  maxGapWords: number;
}

export const DEFAULT_ANCHOR_SETTINGS: AnchorSettings = {
  threshold: 0.6,
  maxGapWords: 3,
};

// 搜索窗口在候选长度两倍之外的余量（token）
const WINDOW_PADDING = 8;

const CJK_CHAR = /[぀-ヿ㐀-䶿一-鿿가-힯豈-﫿]/u;

/**
 * 文本规范化：小写、NFKC、去除标点与符号
 * 中日韩文字按字切分，其余按空白切分
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const cleaned = text
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[\p{P}\p{S}]/gu, ' ');

  for (const chunk of cleaned.split(/\s+/)) {
    if (!chunk) continue;
    if (!CJK_CHAR.test(chunk)) {
      tokens.push(chunk);
      continue;
    }
    // 混排时把连续的非 CJK 字符作为一个 token
    let latin = '';
    for (const char of chunk) {
      if (CJK_CHAR.test(char)) {
        if (latin) tokens.push(latin);
        latin = '';
        tokens.push(char);
      } else {
        latin += char;
      }
    }
    if (latin) tokens.push(latin);
  }

  return tokens;
}

/**
 * 最长公共子序列，返回匹配对 (候选下标, 原始下标)
 * 采用后缀 DP + 正向回溯，优先选择最早的匹配位置
 */
export function longestCommonSubsequence(a: string[], b: string[]): Array<[number, number]> {
  const n = a.length;
  const m = b.length;
  const dp: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      dp[i][j] = a[i] === b[j] ? dp[i + 1][j + 1] + 1 : Math.max(dp[i + 1][j], dp[i][j + 1]);
    }
  }

  const pairs: Array<[number, number]> = [];
  let i = 0;
  let j = 0;
  while (i < n && j < m) {
    if (a[i] === b[j]) {
      pairs.push([i, j]);
      i++;
      j++;
    } else if (dp[i + 1][j] >= dp[i][j + 1]) {
      i++;
    } else {
      j++;
    }
  }
  return pairs;
}

/**
 * 原始词序列的 token 视图
 */
export class SourceTokens {
  readonly tokens: string[] = [];
  /** token → 所属词下标 */
  readonly wordOf: number[] = [];
  /** 词 → 第一个 token 下标（长度为词数 + 1） */
  readonly offsets: number[] = [];

  constructor(words: Word[]) {
    words.forEach((word, index) => {
      this.offsets.push(this.tokens.length);
      for (const token of tokenize(word.text)) {
        this.tokens.push(token);
        this.wordOf.push(index);
      }
    });
    this.offsets.push(this.tokens.length);
  }

  get wordCount(): number {
    return this.offsets.length - 1;
  }
}

export interface AnchorMatch {
  firstWord: number;
  lastWord: number;
  similarity: number;
  /** 候选首尾存在无法回溯到原始词的 token */
  extendsSource: boolean;
}

interface SpanChoice {
  /** 窗口内的起止 token 下标，左闭右开 */
  start: number;
  end: number;
  similarity: number;
}

/**
 * 在窗口内寻找 Dice 相似度最高的连续范围
 * 范围两端都落在候选 token 上；分数相同时取最早的范围
 */
function tightestSpan(candidate: string[], window: string[]): SpanChoice | null {
  const wanted = new Set(candidate);
  let best: SpanChoice | null = null;

  for (let start = 0; start < window.length; start++) {
    if (!wanted.has(window[start])) continue;

    // row[i] = LCS(candidate[0..i), window[start..end))
    let row = new Array<number>(candidate.length + 1).fill(0);
    for (let end = start + 1; end <= window.length; end++) {
      const token = window[end - 1];
      const next = new Array<number>(candidate.length + 1).fill(0);
      for (let i = 1; i <= candidate.length; i++) {
        next[i] = candidate[i - 1] === token ? row[i - 1] + 1 : Math.max(row[i], next[i - 1]);
      }
      row = next;
      if (!wanted.has(token)) continue;

      const similarity = (2 * row[candidate.length]) / (candidate.length + end - start);
      if (!best || similarity > best.similarity) {
        best = { start, end, similarity };
      }
    }
  }

  return best;
}

/**
 * 在 [fromWord, 窗口末尾) 内为候选文本寻找覆盖的词范围
 * 相似度低于阈值时抛出 AlignmentMismatchError
 */
export function anchorCandidate(
  candidate: string[],
  source: SourceTokens,
  fromWord: number,
  slack: number,
  threshold: number,
): AnchorMatch {
  const windowStart = source.offsets[fromWord];
  const windowEnd = Math.min(
    source.tokens.length,
    windowStart + slack + candidate.length * 2 + WINDOW_PADDING,
  );
  const window = source.tokens.slice(windowStart, windowEnd);

  const span = candidate.length > 0 ? tightestSpan(candidate, window) : null;
  if (!span) {
    throw new AlignmentMismatchError(0, threshold);
  }
  if (span.similarity < threshold) {
    throw new AlignmentMismatchError(span.similarity, threshold);
  }

  // 最优范围内的每个 LCS 都用到两端的 token
  const pairs = longestCommonSubsequence(candidate, window.slice(span.start, span.end));
  const [firstCand] = pairs[0];
  const [lastCand] = pairs[pairs.length - 1];

  return {
    firstWord: source.wordOf[windowStart + span.start],
    lastWord: source.wordOf[windowStart + span.end - 1],
    similarity: span.similarity,
    extendsSource: firstCand > 0 || lastCand < candidate.length - 1,
  };
}

/**
 * 重新锚定后的片段范围（词下标，闭区间）
 */
export type AnchoredSpan =
  | {
      kind: 'anchored';
      firstWord: number;
      lastWord: number;
      text: string;
      translation: string | null;
      partial: boolean;
    }
  | { kind: 'fallback'; firstWord: number; lastWord: number };

export interface ReanchorOutcome {
  spans: AnchoredSpan[];
  mismatches: AlignmentMismatchError[];
}

/**
 * 将候选片段依次锚定到原始词序列
 *
 * 结果 spans 按顺序、无重叠地完整覆盖所有词：
 * 锚定成功的范围使用 LLM 文本；其余范围标记为 fallback，由调用方回退到原始分段。
 */
export function reanchor(
  candidates: RefineCandidate[],
  words: Word[],
  settings: AnchorSettings = DEFAULT_ANCHOR_SETTINGS,
): ReanchorOutcome {
  const source = new SourceTokens(words);
  const spans: AnchoredSpan[] = [];
  const mismatches: AlignmentMismatchError[] = [];

  let cursor = 0;
  let slack = 0;

  const pushFallback = (first: number, last: number) => {
    if (last >= first) spans.push({ kind: 'fallback', firstWord: first, lastWord: last });
  };

  for (const candidate of candidates) {
    if (cursor >= source.wordCount) {
      // 原始词已全部覆盖，剩余候选无处锚定
      mismatches.push(
        new AlignmentMismatchError(0, settings.threshold, 'No source words left to anchor the candidate'),
      );
      continue;
    }

    const tokens = tokenize(candidate.text);
    let match: AnchorMatch;
    try {
      match = anchorCandidate(tokens, source, cursor, slack, settings.threshold);
    } catch (error) {
      if (!(error instanceof AlignmentMismatchError)) throw error;
      mismatches.push(error);
      slack += tokens.length;
      continue;
    }

    let firstWord = match.firstWord;
    if (firstWord - cursor <= settings.maxGapWords) {
      firstWord = cursor;
    } else {
      pushFallback(cursor, firstWord - 1);
    }

    spans.push({
      kind: 'anchored',
      firstWord,
      lastWord: match.lastWord,
      text: candidate.text.trim(),
      translation: candidate.translation,
      partial: match.extendsSource,
    });

    cursor = match.lastWord + 1;
    slack = 0;
  }

  const remaining = source.wordCount - cursor;
  if (remaining > 0) {
    const last = spans[spans.length - 1];
    if (last && last.kind === 'anchored' && remaining <= settings.maxGapWords) {
      last.lastWord = source.wordCount - 1;
    } else {
      pushFallback(cursor, source.wordCount - 1);
    }
  }

  return { spans, mismatches };
}
