function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function float(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

function list(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

const MINUTE = 60 * 1000;

export default () => ({
  version: process.env.npm_package_version || '0.1.0',
  port: int(process.env.PORT, 3000),
  nodeEnv: process.env.NODE_ENV || 'development',

  cors: {
    // 逗号分隔；为空时允许任意来源
    origins: list(process.env.CORS_ORIGINS, []),
  },

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
  },

  r2: {
    bucket: process.env.R2_BUCKET,
    accessKey: process.env.R2_ACCESS_KEY,
    secretKey: process.env.R2_SECRET_KEY,
    endpoint: process.env.R2_ENDPOINT,
    publicUrl: process.env.R2_PUBLIC_URL,
  },

  redis: {
    enabled: process.env.REDIS_ENABLED === 'true',
    url: process.env.REDIS_URL || 'redis://localhost:6379',
  },

  worker: {
    // 同时处理的任务数（外部推理 / LLM 调用的并发上限）
    concurrency: int(process.env.WORKER_CONCURRENCY, 2),
    // 队列模式下 job 的最大投递次数（重新投递时从已记录的阶段继续）
    attempts: int(process.env.WORKER_ATTEMPTS, 3),
  },

  deepgram: {
    apiKey: process.env.DEEPGRAM_API_KEY,
    model: process.env.DEEPGRAM_MODEL || 'nova-2',
    baseUrl: process.env.DEEPGRAM_BASE_URL,
  },

  openai: {
    apiKey: process.env.OPENAI_API_KEY,
    model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    baseUrl: process.env.OPENAI_BASE_URL,
    timeoutMs: int(process.env.OPENAI_TIMEOUT_MS, 2 * MINUTE),
  },

  // 提交任务时允许的输入
  input: {
    allowedExtensions: list(process.env.INPUT_ALLOWED_EXTENSIONS, [
      '.mp3',
      '.wav',
      '.flac',
      '.ogg',
      '.m4a',
      '.mp4',
      '.mkv',
      '.avi',
      '.mov',
      '.webm',
    ]).map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()),
    // 本地文件根目录；未设置时只接受 URL
    root: process.env.INPUT_ROOT || null,
    allowedSchemes: list(process.env.INPUT_ALLOWED_SCHEMES, ['https']).map((s) => s.toLowerCase()),
  },

  ffmpeg: {
    path: process.env.FFMPEG_PATH || 'ffmpeg',
    tempDir: process.env.AUDIO_TEMP_DIR,
  },

  // 各阶段超时（毫秒）
  pipeline: {
    timeouts: {
      decode: int(process.env.TIMEOUT_DECODE_MS, 10 * MINUTE),
      transcribe: int(process.env.TIMEOUT_TRANSCRIBE_MS, 60 * MINUTE),
      align: int(process.env.TIMEOUT_ALIGN_MS, 30 * MINUTE),
      diarize: int(process.env.TIMEOUT_DIARIZE_MS, 30 * MINUTE),
      refine: int(process.env.TIMEOUT_REFINE_MS, 20 * MINUTE),
      encode: int(process.env.TIMEOUT_ENCODE_MS, 2 * MINUTE),
    },
  },

  refinement: {
    maxRetries: int(process.env.REFINE_MAX_RETRIES, 2),
    retryDelayMs: int(process.env.REFINE_RETRY_DELAY_MS, 2000),
    // LLM 文本回溯到原始词的 Dice 相似度阈值
    anchorThreshold: float(process.env.REFINE_ANCHOR_THRESHOLD, 0.6),
    maxGapWords: int(process.env.REFINE_MAX_GAP_WORDS, 3),
    batchSize: int(process.env.REFINE_BATCH_SIZE, 40),
  },

  // 提交任务时未指定的默认值
  defaults: {
    formats: list(process.env.DEFAULT_FORMATS, ['json', 'srt', 'vtt']),
    speakerLabels: process.env.DEFAULT_SPEAKER_LABELS !== 'false',
    diarization: process.env.DEFAULT_DIARIZATION !== 'false',
  },

  task: {
    pollIntervalSeconds: 5, // 默认轮询间隔
    stuckAfterMinutes: int(process.env.TASK_STUCK_AFTER_MINUTES, 180),
    retentionHours: int(process.env.TASK_RETENTION_HOURS, 24 * 7), // 0 表示永久保留
  },
});
