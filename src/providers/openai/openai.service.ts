import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { LLMError, errorMessage } from '../../common/errors/pipeline.errors';
import { LlmClient } from '../../modules/pipeline/pipeline.interfaces';
import { RefineCandidate } from '../../modules/transcripts/reanchor';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 解析 LLM 返回结果
 * 格式：{ "segments": [{ "text": string, "translation"?: string }] }
 */
export function parseCandidates(content: string): RefineCandidate[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new LLMError('malformed_response', 'LLM response is not valid JSON');
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.segments)) {
    throw new LLMError('malformed_response', 'LLM response has no "segments" array');
  }

  const candidates = parsed.segments.map((seg: unknown, i: number): RefineCandidate => {
    if (!isRecord(seg) || typeof seg.text !== 'string') {
      throw new LLMError('malformed_response', `LLM segment ${i} has no text`);
    }
    return {
      text: seg.text,
      translation: typeof seg.translation === 'string' ? seg.translation : null,
    };
  });

  if (candidates.every((c) => c.text.trim().length === 0)) {
    throw new LLMError('empty_output', 'LLM returned no segments');
  }

  return candidates;
}

@Injectable()
export class OpenAIService implements LlmClient {
  private readonly logger = new Logger(OpenAIService.name);
  private client: OpenAI | null = null;
  private readonly model: string;

  constructor(private configService: ConfigService) {
    const apiKey = this.configService.get<string>('openai.apiKey');
    this.model = this.configService.get<string>('openai.model') || 'gpt-4o-mini';

    if (apiKey) {
      this.client = new OpenAI({
        apiKey,
        baseURL: this.configService.get<string>('openai.baseUrl') || undefined,
        timeout: this.configService.get<number>('openai.timeoutMs') ?? 120_000,
        // 重试由精修服务统一控制
        maxRetries: 0,
      });
      this.logger.log(`OpenAI client initialized (model: ${this.model})`);
    } else {
      this.logger.warn('OPENAI_API_KEY not configured, refinement will be disabled');
    }
  }

  /**
   * 检查 OpenAI 服务是否可用
   */
  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * 发送序列化字幕与指令，返回候选片段
   */
  async refine(
    serializedTranscript: string,
    instruction: string,
    signal?: AbortSignal,
  ): Promise<RefineCandidate[]> {
    if (!this.client) {
      throw new LLMError('unavailable', 'OpenAI service not available. Please configure OPENAI_API_KEY.');
    }

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: instruction },
            { role: 'user', content: serializedTranscript },
          ],
          temperature: 0.2,
          response_format: { type: 'json_object' },
        },
        { signal },
      );

      content = response.choices[0]?.message?.content;
      this.logger.debug(`Refinement tokens: ${response.usage?.total_tokens ?? 'unknown'}`);
    } catch (error) {
      throw this.toLLMError(error);
    }

    if (!content) {
      throw new LLMError('empty_output', 'Empty response from OpenAI');
    }

    return parseCandidates(content);
  }

  private toLLMError(error: unknown): LLMError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new LLMError('timeout', error.message);
    }
    if (error instanceof OpenAI.RateLimitError) {
      return new LLMError('rate_limited', error.message);
    }
    return new LLMError('request_failed', errorMessage(error));
  }
}
