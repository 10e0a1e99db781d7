import type { AudioPlacement, VideoLayout } from '../types.js';

// External services the pipeline sequences but does not implement.

export interface DialogueRequest {
  scenario: string;
  speakerAName: string;
  speakerBName: string;
  targetDurationSec: number;
  temperature: number;
  exchanges: number;
}

export interface DialogueService {
  /** Raw model output, expected to contain one JSON object. */
  generate(request: DialogueRequest): Promise<string>;
}

export interface SpeechRequest {
  text: string;
  voice: string;
  rate: string;      // e.g. "+10%"
  volume: string;    // e.g. "-5%"
  outputPath: string;
}

export interface SpeechService {
  synthesize(request: SpeechRequest): Promise<{ filePath: string; durationSec: number }>;
}

export interface ImageRequest {
  prompt: string;
  negativePrompt: string;
  width: number;
  height: number;
  outputPath: string;
  /** Aborted when the caller has stopped waiting for the image. */
  signal?: AbortSignal;
}

export interface ImageService {
  generate(request: ImageRequest): Promise<string>;
}

export interface LipSyncStatus {
  installed: boolean;
  reason?: string;
}

export interface LipSyncRequest {
  portraitPath: string;
  audioPath: string;
  outputPath: string;
  /** Aborting stops the running model. */
  signal?: AbortSignal;
}

export interface LipSyncService {
  status(): Promise<LipSyncStatus>;
  animate(request: LipSyncRequest): Promise<string>;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface StillVideoOptions {
  /** Hold the still for this audio's length and attach it. */
  audioPath?: string;
  /** Hold the still for a fixed length, silent. Used when there is no audio. */
  durationSec?: number;
  fps: number;
}

export interface OverlayOptions {
  background: string;
  videoA: string;
  videoB: string;
  layout: VideoLayout;
  durationSec: number;
  frame: FrameSize;
}

export interface FinalizeOptions extends FrameSize {
  fps: number;
  codec: string;
  audioCodec: string;
}

/**
 * Deterministic audio/video operations. Every method writes `outputPath`
 * (creating parent directories) and resolves with the path of the result.
 */
export interface MediaService {
  probeDuration(filePath: string): Promise<number>;
  concatAudio(inputs: string[], outputPath: string): Promise<string>;
  mixAudio(placements: AudioPlacement[], outputPath: string): Promise<string>;
  adjustAudio(inputPath: string, outputPath: string, adjust: { tempo: number; gain: number }): Promise<string>;
  createSolidImage(outputPath: string, options: FrameSize & { color: string }): Promise<string>;
  resizeImage(inputPath: string, outputPath: string, size: FrameSize): Promise<string>;
  createStillVideo(imagePath: string, outputPath: string, options: StillVideoOptions): Promise<string>;
  overlayPortraits(options: OverlayOptions, outputPath: string): Promise<string>;
  replaceAudio(videoPath: string, audioPath: string, outputPath: string): Promise<string>;
  finalizeVideo(inputPath: string, outputPath: string, options: FinalizeOptions): Promise<string>;
  extractThumbnail(videoPath: string, outputPath: string, options: { atSec: number; width: number }): Promise<string>;
}

export interface PipelineServices {
  dialogue: DialogueService;
  speech: SpeechService;
  images: ImageService;
  lipSync: LipSyncService;
  media: MediaService;
}
