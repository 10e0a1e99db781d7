import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { VideoLayout, VideoResolution } from './types.js';

export interface AppConfig {
  port: number;
  paths: {
    dataDir: string;
    outputsDir: string;
    inputsDir: string;
    modelsDir: string;
  };
  credentials: {
    geminiApiKey?: string;
    openaiApiKey?: string;
    elevenLabsApiKey?: string;
  };
  dialogue: {
    model: string;
    temperature: number;
    targetDurationSec: number;
  };
  tts: {
    voiceA: string;
    voiceB: string;
    rate: string;
    volume: string;
  };
  video: {
    resolution: VideoResolution;
    fps: number;
    layout: VideoLayout;
    codec: string;
    audioCodec: string;
  };
  lipSync: {
    batchSize: number;
    faceDetBatchSize: number;
    resizeFactor: number;
    pythonBin: string;
  };
  /** 0 disables the per-stage timeout. */
  stageTimeoutMs: number;
  /** 0 means no limit on concurrently running jobs. */
  maxConcurrentJobs: number;
}

const ADJUSTMENT_PATTERN = /^[+-]\d+(\.\d+)?%$/;

/**
 * Convert a relative adjustment such as "+10%" or "-5%" into a multiplier (1.1, 0.95).
 */
export function parseAdjustment(value: string): number {
  if (!ADJUSTMENT_PATTERN.test(value)) {
    throw new ConfigError([`Invalid adjustment "${value}" (expected e.g. "+10%" or "-5%")`]);
  }
  return 1 + parseFloat(value.slice(0, -1)) / 100;
}

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const adjustment = z
  .string()
  .regex(ADJUSTMENT_PATTERN, 'expected a signed percentage such as "+10%"')
  .refine(v => {
    const factor = 1 + parseFloat(v.slice(0, -1)) / 100;
    return factor >= 0.5 && factor <= 2;
  }, 'must stay between -50% and +100%')
  .default('+0%');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATA_DIR: z.string().default('data'),
  OUTPUTS_DIR: z.string().default('outputs'),
  INPUTS_DIR: z.string().default('inputs'),
  MODELS_DIR: z.string().default('models'),
  GEMINI_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  ELEVENLABS_API_KEY: optionalSecret,
  DIALOGUE_MODEL: z.string().default('gemini-1.5-flash'),
  DIALOGUE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  TARGET_DURATION_SECONDS: z.coerce.number().int().positive().default(45),
  VOICE_A: z.string().default('george'),
  VOICE_B: z.string().default('sarah'),
  TTS_RATE: adjustment,
  TTS_VOLUME: adjustment,
  VIDEO_RESOLUTION: z.enum(['480p', '720p', '1080p']).default('720p'),
  VIDEO_FPS: z.coerce.number().int().positive().default(25),
  VIDEO_LAYOUT: z.enum(['side-by-side', 'conversation']).default('side-by-side'),
  LIPSYNC_BATCH_SIZE: z.coerce.number().int().positive().default(16),   // lower for 4GB VRAM
  LIPSYNC_FACE_DET_BATCH_SIZE: z.coerce.number().int().positive().default(8),
  LIPSYNC_RESIZE_FACTOR: z.coerce.number().int().positive().default(1),
  PYTHON_BIN: z.string().default('python3'),
  STAGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(0).default(0),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    paths: {
      dataDir: path.resolve(e.DATA_DIR),
      outputsDir: path.resolve(e.OUTPUTS_DIR),
      inputsDir: path.resolve(e.INPUTS_DIR),
      modelsDir: path.resolve(e.MODELS_DIR),
    },
    credentials: {
      geminiApiKey: e.GEMINI_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      elevenLabsApiKey: e.ELEVENLABS_API_KEY,
    },
    dialogue: {
      model: e.DIALOGUE_MODEL,
      temperature: e.DIALOGUE_TEMPERATURE,
      targetDurationSec: e.TARGET_DURATION_SECONDS,
    },
    tts: {
      voiceA: e.VOICE_A,
      voiceB: e.VOICE_B,
      rate: e.TTS_RATE,
      volume: e.TTS_VOLUME,
    },
    video: {
      resolution: e.VIDEO_RESOLUTION,
      fps: e.VIDEO_FPS,
      layout: e.VIDEO_LAYOUT,
      codec: 'libx264',
      audioCodec: 'aac',
    },
    lipSync: {
      batchSize: e.LIPSYNC_BATCH_SIZE,
      faceDetBatchSize: e.LIPSYNC_FACE_DET_BATCH_SIZE,
      resizeFactor: e.LIPSYNC_RESIZE_FACTOR,
      pythonBin: e.PYTHON_BIN,
    },
    stageTimeoutMs: e.STAGE_TIMEOUT_MS,
    maxConcurrentJobs: e.MAX_CONCURRENT_JOBS,
  };
}
