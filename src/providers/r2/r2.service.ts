import { Injectable, OnModuleDestroy, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { ArtifactStorage } from '../../modules/pipeline/pipeline.interfaces';

/**
 * 字幕文件存储（Cloudflare R2，S3 兼容）
 */
@Injectable()
export class R2Service implements ArtifactStorage, OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(R2Service.name);
  private client: S3Client | null = null;
  private bucket = '';
  private publicUrl = '';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    const endpoint = this.configService.get<string>('r2.endpoint');
    const accessKey = this.configService.get<string>('r2.accessKey');
    const secretKey = this.configService.get<string>('r2.secretKey');
    this.bucket = this.configService.get<string>('r2.bucket') || '';
    this.publicUrl = this.configService.get<string>('r2.publicUrl') || '';

    if (!endpoint || !accessKey || !secretKey || !this.bucket) {
      this.logger.warn('R2 configuration missing, subtitle files will not be uploaded');
      return;
    }

    this.client = new S3Client({
      region: 'auto',
      endpoint,
      credentials: {
        accessKeyId: accessKey,
        secretAccessKey: secretKey,
      },
    });

    this.logger.log('R2 client initialized');
  }

  onModuleDestroy() {
    this.client?.destroy();
    this.client = null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * 上传文件，返回公开访问地址
   */
  async uploadFile(
    key: string,
    body: Buffer | string,
    contentType: string,
  ): Promise<string> {
    if (!this.client) {
      throw new Error('R2 storage is not configured');
    }

    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
    });

    await this.client.send(command);
    return `${this.publicUrl}/${key}`;
  }

  upload(key: string, body: string, contentType: string): Promise<string> {
    return this.uploadFile(key, body, contentType);
  }
}
