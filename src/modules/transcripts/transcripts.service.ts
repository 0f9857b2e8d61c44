import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../../common/errors/pipeline.errors';
import {
  ArtifactResult,
  EncodingResult,
  OutputFormat,
  Segment,
} from '../../database/entities';
import { ARTIFACT_STORAGE, ArtifactStorage } from '../pipeline/pipeline.interfaces';
import { CONTENT_TYPES, EncodeOptions, encodeTranscript } from './encoders';

@Injectable()
export class TranscriptsService {
  private readonly logger = new Logger(TranscriptsService.name);

  constructor(@Inject(ARTIFACT_STORAGE) private readonly storage: ArtifactStorage) {}

  /**
   * 生成所有请求的字幕格式并上传
   * 各格式互相独立并发执行，单个格式失败不影响其他格式
   */
  async exportTranscript(
    taskId: string,
    segments: Segment[],
    formats: OutputFormat[],
    options: EncodeOptions,
  ): Promise<EncodingResult> {
    const settled = await Promise.allSettled(
      formats.map((format) => this.exportFormat(taskId, format, segments, options)),
    );

    const artifacts: EncodingResult['artifacts'] = {};
    settled.forEach((outcome, i) => {
      const format = formats[i];
      if (outcome.status === 'fulfilled') {
        artifacts[format] = outcome.value;
      } else {
        const message = errorMessage(outcome.reason);
        this.logger.warn(`Export ${format} failed for task ${taskId}: ${message}`);
        artifacts[format] = { status: 'failed', error: message };
      }
    });

    return { artifacts };
  }

  /**
   * 仅编码，不上传（用于按需下载）
   */
  render(format: OutputFormat, segments: Segment[], options: EncodeOptions): string {
    return encodeTranscript(format, segments, options);
  }

  private async exportFormat(
    taskId: string,
    format: OutputFormat,
    segments: Segment[],
    options: EncodeOptions,
  ): Promise<ArtifactResult> {
    const content = encodeTranscript(format, segments, options);
    const bytes = Buffer.byteLength(content, 'utf8');

    if (!this.storage.isAvailable()) {
      return { status: 'succeeded', url: null, bytes };
    }

    const key = `transcripts/${taskId}/output.${format}`;
    const url = await this.storage.upload(key, content, CONTENT_TYPES[format]);
    this.logger.log(`Uploaded ${format} for task ${taskId} (${bytes} bytes)`);
    return { status: 'succeeded', url, bytes };
  }
}
