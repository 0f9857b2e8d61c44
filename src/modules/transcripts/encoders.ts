import { OutputFormat, Segment } from '../../database/entities';

export interface EncodeOptions {
  language: string | null;
  /** SRT / VTT 中是否在文本前标注说话人 */
  speakerLabels: boolean;
}

export const CONTENT_TYPES: Record<OutputFormat, string> = {
  [OutputFormat.JSON]: 'application/json; charset=utf-8',
  [OutputFormat.SRT]: 'text/plain; charset=utf-8',
  [OutputFormat.VTT]: 'text/vtt; charset=utf-8',
};

function formatTimestamp(seconds: number, separator: ',' | '.'): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const s = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}${separator}${String(ms).padStart(3, '0')}`;
}

export function formatSRTTime(seconds: number): string {
  return formatTimestamp(seconds, ',');
}

export function formatVTTTime(seconds: number): string {
  return formatTimestamp(seconds, '.');
}

/**
 * JSON：完整保留词级时间戳、说话人、置信度和译文
 * 字段顺序固定，同一输入的输出逐字节一致
 */
export function encodeJSON(segments: Segment[], options: EncodeOptions): string {
  const body = {
    language: options.language,
    segments: segments.map((seg) => ({
      id: seg.id,
      start: seg.start,
      end: seg.end,
      text: seg.text,
      speaker_id: seg.speaker_id,
      confidence: seg.confidence,
      translated_text: seg.translated_text,
      refinement_partial: seg.refinement_partial,
      words: seg.words.map((w) => ({
        text: w.text,
        start: w.start,
        end: w.end,
        confidence: w.confidence,
      })),
    })),
  };
  return JSON.stringify(body, null, 2) + '\n';
}

/**
 * 字幕块内不能出现空行，文本中的换行折叠为空格
 */
function singleLine(text: string): string {
  return text.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

/**
 * SRT：序号 + 时间 + 文本（译文作为第二行）
 */
export function encodeSRT(segments: Segment[], options: EncodeOptions): string {
  return segments
    .map((seg, i) => {
      const body = singleLine(seg.text);
      const text = options.speakerLabels && seg.speaker_id ? `${seg.speaker_id}: ${body}` : body;
      const lines = [String(i + 1), `${formatSRTTime(seg.start)} --> ${formatSRTTime(seg.end)}`, text];
      const translation = singleLine(seg.translated_text ?? '');
      if (translation) lines.push(translation);
      return lines.join('\n') + '\n';
    })
    .join('\n');
}

function escapeVTT(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * VTT：说话人使用 <v> 语音标签
 */
export function encodeVTT(segments: Segment[], options: EncodeOptions): string {
  const body = segments
    .map((seg) => {
      const text = escapeVTT(singleLine(seg.text));
      const cue =
        options.speakerLabels && seg.speaker_id ? `<v ${escapeVTT(seg.speaker_id)}>${text}` : text;
      const lines = [`${formatVTTTime(seg.start)} --> ${formatVTTTime(seg.end)}`, cue];
      const translation = singleLine(seg.translated_text ?? '');
      if (translation) lines.push(escapeVTT(translation));
      return lines.join('\n') + '\n';
    })
    .join('\n');
  return 'WEBVTT\n\n' + body;
}

export function encodeTranscript(
  format: OutputFormat,
  segments: Segment[],
  options: EncodeOptions,
): string {
  switch (format) {
    case OutputFormat.JSON:
      return encodeJSON(segments, options);
    case OutputFormat.SRT:
      return encodeSRT(segments, options);
    case OutputFormat.VTT:
      return encodeVTT(segments, options);
  }
}
