import { RefinementOptions, Segment } from '../../database/entities';

/**
 * 序列化待精修的片段
 * 使用短字段名减少 token：i(索引), s(开始), e(结束), t(文本), sp(说话人)
 */
export function serializeTranscript(segments: Segment[]): string {
  return JSON.stringify(
    segments.map((seg, i) => ({
      i,
      s: seg.start,
      e: seg.end,
      t: seg.text,
      sp: seg.speaker_id,
    })),
  );
}

/**
 * 构建精修指令，所有启用的选项合并到一次调用中
 */
export function buildInstruction(options: RefinementOptions): string {
  const rules: string[] = [];

  if (options.semantic_segmentation) {
    rules.push(
      'Re-segment the transcript at natural sentence and clause boundaries. Merge fragments that belong to the same sentence and split run-on segments.',
      'Never merge text spoken by different speakers (different "sp" values) into one segment.',
    );
  } else {
    rules.push('Keep the existing segmentation: return exactly one output segment per input segment, in the same order.');
  }

  if (options.error_correction) {
    rules.push(
      'Fix obvious speech recognition errors (misheard words, wrong homophones, broken spacing) without changing the meaning.',
    );
  }

  if (options.expression_optimization) {
    rules.push(
      'Make the text read naturally as subtitles: remove filler words and stutters, add punctuation, but do not paraphrase or add content.',
    );
  }

  if (!options.error_correction && !options.expression_optimization) {
    rules.push('Do not reword the text; keep every word as it was recognized.');
  }

  if (options.translate_to) {
    rules.push(
      `Translate each output segment into ${options.translate_to} and put the translation in "translation". Keep "text" in the original language.`,
    );
  }

  rules.push(
    'Keep the original order. Every output segment must only contain words from the input; do not add new content.',
    'Do not output timestamps; timing is recovered from the source words.',
  );

  const numbered = rules.map((rule, i) => `${i + 1}. ${rule}`).join('\n');

  return `You are a professional subtitle editor working on an automatic speech recognition transcript.

## Input
A JSON array. Each element has: i (index), s (start seconds), e (end seconds), t (text), sp (speaker or null).

## Output
Return a JSON object:
{
  "segments": [
    { "text": "segment text"${options.translate_to ? ', "translation": "translated text"' : ''} }
  ]
}

## Rules
${numbered}`;
}
