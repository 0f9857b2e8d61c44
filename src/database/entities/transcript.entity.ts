/**
 * 词级时间戳（由转录 + 强制对齐产出，之后不可变）
 */
export interface Word {
  text: string;
  start: number; // 开始时间（秒）
  end: number; // 结束时间（秒）
  confidence: number; // 0 ~ 1
}

/**
 * 说话人分离结果中的一段发言
 */
export interface SpeakerTurn {
  speaker_id: string;
  start: number;
  end: number;
}

/**
 * 字幕片段
 * start / end 始终取自 words 的首尾时间戳
 */
export interface Segment {
  id: number;
  start: number;
  end: number;
  text: string;
  words: Word[];
  speaker_id: string | null;
  confidence: number;
  translated_text: string | null;
  refinement_partial: boolean; // LLM 结果未能完整回溯到原始词
}

/**
 * 单词的说话人归属
 */
export interface SpeakerAssignment {
  word: Word;
  speaker_id: string | null;
  overlap: number; // 与所选发言的重叠时长（秒）
}

/**
 * ASR 原始分段（转录阶段产出）
 */
export interface TranscriptionSegment {
  start: number;
  end: number;
  text: string;
  words?: Word[];
}

export interface TranscriptionResult {
  language: string;
  segments: TranscriptionSegment[];
}

/**
 * 对齐后的 ASR 分段
 */
export interface AlignedSegment {
  text: string;
  words: Word[];
}

/**
 * 输出格式
 */
export enum OutputFormat {
  JSON = 'json',
  SRT = 'srt',
  VTT = 'vtt',
}
