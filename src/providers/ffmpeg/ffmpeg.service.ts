import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { spawn } from 'child_process';
import { existsSync, mkdirSync } from 'fs';
import { stat, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InferenceError, errorMessage } from '../../common/errors/pipeline.errors';
import { DecodedAudio, PipelineStage } from '../../database/entities';
import { AudioDecoder } from '../../modules/pipeline/pipeline.interfaces';

const SAMPLE_RATE = 16000;
const WAV_HEADER_BYTES = 44;

/**
 * 音频解码（委托 ffmpeg）
 * 输入可以是本地路径或 ffmpeg 支持的 URL，统一转为 16kHz 单声道 16-bit WAV
 */
@Injectable()
export class FfmpegService implements AudioDecoder, OnModuleInit {
  private readonly logger = new Logger(FfmpegService.name);
  private readonly ffmpegPath: string;
  private readonly tempDir: string;

  constructor(private configService: ConfigService) {
    this.ffmpegPath = this.configService.get<string>('ffmpeg.path') || 'ffmpeg';
    this.tempDir =
      this.configService.get<string>('ffmpeg.tempDir') || join(tmpdir(), 'subtitle-pipeline');
  }

  onModuleInit() {
    if (!existsSync(this.tempDir)) {
      mkdirSync(this.tempDir, { recursive: true });
    }
  }

  async decode(inputRef: string, taskId: string): Promise<DecodedAudio> {
    const outputPath = join(this.tempDir, `${taskId}.wav`);
    this.logger.log(`Decoding ${inputRef} -> ${outputPath}`);

    await this.runFfmpeg([
      '-nostdin',
      '-y',
      '-i', inputRef,
      '-vn',
      '-ac', '1',
      '-ar', String(SAMPLE_RATE),
      '-c:a', 'pcm_s16le',
      '-f', 'wav',
      outputPath,
    ]);

    const { size } = await stat(outputPath);
    const duration_sec = Math.max(0, size - WAV_HEADER_BYTES) / (SAMPLE_RATE * 2);
    this.logger.log(`Decoded audio: ${duration_sec.toFixed(1)}s`);

    return { path: outputPath, duration_sec, sample_rate: SAMPLE_RATE };
  }

  async isAvailable(audio: DecodedAudio): Promise<boolean> {
    return existsSync(audio.path);
  }

  async release(audio: DecodedAudio): Promise<void> {
    try {
      await unlink(audio.path);
    } catch (error) {
      const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
      if (!missing) {
        this.logger.warn(`Failed to remove decoded audio ${audio.path}: ${error}`);
      }
    }
  }

  async canRun(): Promise<boolean> {
    try {
      await this.runFfmpeg(['-hide_banner', '-version']);
      return true;
    } catch (error) {
      this.logger.warn(`ffmpeg is not usable: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * 运行 ffmpeg 命令
   */
  private runFfmpeg(args: string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.ffmpegPath, args);

      let stderr = '';
      proc.stderr.on('data', (data: Buffer) => {
        // 只保留最后一段输出，足够定位错误
        stderr = (stderr + data.toString()).slice(-4000);
      });

      proc.on('close', (code) => {
        if (code === 0) {
          resolve();
        } else {
          this.logger.error(`ffmpeg exited with code ${code}: ${stderr}`);
          reject(new InferenceError(PipelineStage.DECODE, `ffmpeg failed with code ${code}: ${stderr.trim()}`));
        }
      });

      proc.on('error', (err) => {
        this.logger.error(`ffmpeg spawn error: ${err.message}`);
        reject(new InferenceError(PipelineStage.DECODE, `Failed to spawn ffmpeg: ${err.message}`));
      });
    });
  }
}
