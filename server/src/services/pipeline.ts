import path from 'path';
import fs from 'fs';
import fsp from 'fs/promises';
import { v4 as uuid } from 'uuid';
import type { AppConfig } from '../config.js';
import {
  CollaboratorFailure,
  ParseError,
  PipelineError,
  ResourceError,
  ValidationError,
  describeError,
} from '../errors.js';
import type {
  AudioSegment,
  ConversationScript,
  GenerationRequest,
  IntermediateFiles,
  PipelineResult,
  Speaker,
  StageUpdate,
} from '../types.js';
import type { LipSyncStatus, PipelineServices } from './collaborators.js';
import { exchangeCount } from './gemini.js';
import { SCENE_PRESETS, selectScenePreset } from './scene-generator.js';
import { parseDialogueResponse, saveScript, speakerName, totalDuration } from './script.js';
import { STAGE, TOTAL_STAGES, type StageDefinition } from './stages.js';
import {
  buildMixSchedule,
  combineAudio,
  concatSpeakerTrack,
  partitionBySpeaker,
  reconcileTimings,
} from './synchronizer.js';
import { requiredCredentials, validateInputs } from './validation.js';
import { FRAME, RESOLUTIONS } from './video-utils.js';

export const PLACEHOLDER_BACKGROUND_COLOR = '#1e1e28';
export const THUMBNAIL_WIDTH = 320;
const DEFAULT_SPEAKER_A = 'Alex';
const DEFAULT_SPEAKER_B = 'Sam';

export interface GenerateOptions {
  /** Names the workspace under `<dataDir>/jobs`. Generated when absent. */
  jobId?: string;
  outputPath: string;
  /** Defaults to the output path with a `_thumb.jpg` suffix. */
  thumbnailPath?: string;
  onStage?: (update: StageUpdate) => void;
}

/**
 * Race `work` against the configured timeout. On timeout the signal handed to
 * `work` is aborted; whatever it still finishes afterwards must not land on a
 * path the run goes on to use.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) return work(controller.signal);

  const running = work(controller.signal);
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const failure = new CollaboratorFailure('pipeline', `Stage "${label}" timed out after ${timeoutMs} ms`);
      running.catch(err => console.warn(`"${label}" failed after timing out: ${describeError(err)}`));
      controller.abort(failure);
      reject(failure);
    }, timeoutMs);
  });

  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Run one collaborator call, reporting foreign errors as a CollaboratorFailure. */
async function call<T>(service: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof PipelineError) throw err;
    throw new CollaboratorFailure(service, `${service} failed: ${describeError(err)}`, { cause: err });
  }
}

/** Move a finished artifact out of the workspace; falls back to copy across devices. */
async function publish(source: string, destination: string): Promise<void> {
  await fsp.mkdir(path.dirname(destination), { recursive: true });
  try {
    await fsp.rename(source, destination);
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) {
      throw new ResourceError(`Could not move ${source} to ${destination}: ${describeError(err)}`, { cause: err });
    }
    const partial = `${destination}.partial`;
    await fsp.copyFile(source, partial);
    await fsp.rename(partial, destination);
    await fsp.rm(source, { force: true });
  }
}

export function defaultThumbnailPath(outputPath: string): string {
  return outputPath.replace(/(\.\w+)?$/, '_thumb.jpg');
}

interface RunContext {
  jobId: string;
  workspace: string;
  request: GenerationRequest;
  intermediateFiles: IntermediateFiles;
  onStage?: (update: StageUpdate) => void;
}

/**
 * Sequences the seven generation stages over the injected collaborators.
 * `generate` never throws: any failure ends the run with a failure result and
 * leaves nothing at the requested output path.
 */
export class ConversationPipeline {
  constructor(
    private readonly config: AppConfig,
    private readonly services: PipelineServices,
  ) {}

  /** Every problem with the request, or an empty list. */
  validateInputs(request: Pick<GenerationRequest, 'portraitA' | 'portraitB' | 'scenario'>): Promise<string[]> {
    return validateInputs({
      portraitA: request.portraitA,
      portraitB: request.portraitB,
      scenario: request.scenario,
      credentials: requiredCredentials(this.config),
    });
  }

  async generate(request: GenerationRequest, options: GenerateOptions): Promise<PipelineResult> {
    const jobId = options.jobId ?? uuid();
    const ctx: RunContext = {
      jobId,
      workspace: path.join(this.config.paths.dataDir, 'jobs', jobId),
      request,
      intermediateFiles: {},
      onStage: options.onStage,
    };
    const thumbnailPath = options.thumbnailPath ?? defaultThumbnailPath(options.outputPath);

    console.log(`[${jobId}] Starting generation: "${request.scenario.slice(0, 60)}"`);

    try {
      await this.stage(ctx, STAGE.validate, async () => {
        const issues = await this.validateInputs(request);
        if (issues.length > 0) throw new ValidationError(issues);
        await fsp.mkdir(ctx.workspace, { recursive: true });
      });

      const script = await this.stage(ctx, STAGE.dialogue, () => this.generateDialogue(ctx));
      const { timed, segments } = await this.stage(ctx, STAGE.speech, () => this.synthesizeSpeech(ctx, script));
      const background = await this.stage(ctx, STAGE.background, () => this.createBackground(ctx), false);
      const clips = await this.stage(ctx, STAGE.animate, () => this.animatePortraits(ctx, timed, segments), false);
      const assembled = await this.stage(ctx, STAGE.assemble, () =>
        this.assembleVideo(ctx, timed, segments, background, clips),
      );
      const rendered = await this.stage(ctx, STAGE.finalize, () => this.renderFinal(ctx, assembled));
      // Outside the timeout: once publishing starts it runs to the end or undoes itself.
      await this.publishResults(rendered, options.outputPath, thumbnailPath);

      console.log(`[${jobId}] Generation complete: ${options.outputPath}`);
      return {
        success: true,
        outputPath: options.outputPath,
        thumbnailPath,
        script: timed,
        error: null,
        intermediateFiles: ctx.intermediateFiles,
      };
    } catch (err) {
      const error = describeError(err);
      console.error(`[${jobId}] Generation failed: ${error}`);
      return {
        success: false,
        outputPath: null,
        thumbnailPath: null,
        script: null,
        error,
        intermediateFiles: ctx.intermediateFiles,
      };
    }
  }

  private async stage<T>(
    ctx: RunContext,
    stage: StageDefinition,
    body: () => Promise<T>,
    bounded = true,
  ): Promise<T> {
    console.log(`[${ctx.jobId}] Step ${stage.index}/${TOTAL_STAGES}: ${stage.name}...`);
    try {
      ctx.onStage?.({ index: stage.index, name: stage.name, percent: stage.percent });
    } catch (err) {
      console.warn(`[${ctx.jobId}] Stage observer threw: ${describeError(err)}`);
    }
    // Stages with a fallback bound their fallible call instead of the whole stage.
    return bounded ? withTimeout(body, this.config.stageTimeoutMs, stage.name) : body();
  }

  private record(ctx: RunContext, stage: StageDefinition, ...files: string[]): void {
    (ctx.intermediateFiles[stage.name] ??= []).push(...files);
  }

  // ─── Stage 2 ───

  private async generateDialogue(ctx: RunContext): Promise<ConversationScript> {
    const { request } = ctx;
    const targetDurationSec = request.targetDurationSec ?? this.config.dialogue.targetDurationSec;
    const speakerAName = request.speakerAName ?? DEFAULT_SPEAKER_A;
    const speakerBName = request.speakerBName ?? DEFAULT_SPEAKER_B;

    const response = await call('dialogue service', () =>
      this.services.dialogue.generate({
        scenario: request.scenario,
        speakerAName,
        speakerBName,
        targetDurationSec,
        temperature: this.config.dialogue.temperature,
        exchanges: exchangeCount(targetDurationSec),
      }),
    );

    const script = parseDialogueResponse(response, speakerAName, speakerBName);
    if (script.lines.length === 0) {
      throw new ParseError('Dialogue service returned no usable lines');
    }
    this.record(ctx, STAGE.dialogue, await saveScript(script, path.join(ctx.workspace, 'script.json')));
    console.log(`  Generated ${script.lines.length} dialogue lines (~${totalDuration(script).toFixed(1)}s)`);
    return script;
  }

  // ─── Stage 3 ───

  private async synthesizeSpeech(
    ctx: RunContext,
    script: ConversationScript,
  ): Promise<{ timed: ConversationScript; segments: AudioSegment[] }> {
    const { tts } = this.config;
    const voices: Record<Speaker, string> = {
      A: ctx.request.voiceA ?? tts.voiceA,
      B: ctx.request.voiceB ?? tts.voiceB,
    };
    const audioDir = path.join(ctx.workspace, 'audio');

    const segments = await Promise.all(
      script.lines.map((line, i) =>
        call('speech service', async (): Promise<AudioSegment> => {
          const outputPath = path.join(audioDir, `line_${String(i).padStart(3, '0')}_${line.speaker}.mp3`);
          const { filePath, durationSec } = await this.services.speech.synthesize({
            text: line.text,
            voice: voices[line.speaker],
            rate: tts.rate,
            volume: tts.volume,
            outputPath,
          });
          if (!(durationSec > 0)) {
            throw new ResourceError(`Speech for line ${i} has no measurable duration`);
          }
          return { filePath, durationSec, speaker: line.speaker, text: line.text, lineIndex: i };
        }),
      ),
    );

    const timed = reconcileTimings(script, segments.map(s => s.durationSec));
    this.record(ctx, STAGE.speech, ...segments.map(s => s.filePath));
    this.record(ctx, STAGE.speech, await saveScript(timed, path.join(ctx.workspace, 'script_timed.json')));
    console.log(`  Synthesized ${segments.length} lines, ${totalDuration(timed).toFixed(1)}s total`);
    return { timed, segments };
  }

  // ─── Stage 4 ───

  private async createBackground(ctx: RunContext): Promise<string> {
    const outputPath = path.join(ctx.workspace, 'background.png');
    // A timed-out call may still finish later; it only ever writes the candidate.
    const candidate = path.join(ctx.workspace, 'background_candidate.png');
    const supplied = ctx.request.backgroundPath;

    let background: string;
    try {
      const obtained = await withTimeout(
        signal => this.obtainBackground(ctx, candidate, signal, supplied),
        this.config.stageTimeoutMs,
        STAGE.background.name,
      );
      await fsp.rename(obtained, outputPath);
      background = outputPath;
    } catch (err) {
      console.warn(`  Background unavailable (${describeError(err)}), using placeholder`);
      background = await call('media encoder', () =>
        this.services.media.createSolidImage(outputPath, { ...FRAME, color: PLACEHOLDER_BACKGROUND_COLOR }),
      );
    }
    this.record(ctx, STAGE.background, background);
    return background;
  }

  private async obtainBackground(
    ctx: RunContext,
    outputPath: string,
    signal: AbortSignal,
    supplied?: string,
  ): Promise<string> {
    if (supplied) {
      if (fs.existsSync(supplied)) {
        return this.services.media.resizeImage(supplied, outputPath, FRAME);
      }
      console.warn(`  Background image not found: ${supplied}, generating one`);
    }
    const preset = SCENE_PRESETS[selectScenePreset(ctx.request.scenario)];
    return this.services.images.generate({
      prompt: preset.prompt,
      negativePrompt: preset.negativePrompt,
      width: FRAME.width,
      height: FRAME.height,
      outputPath,
      signal,
    });
  }

  // ─── Stage 5 ───

  private async animatePortraits(
    ctx: RunContext,
    script: ConversationScript,
    segments: AudioSegment[],
  ): Promise<Record<Speaker, string>> {
    const { media } = this.services;
    const useLipSync = ctx.request.useLipSync ?? true;
    const lipSync: LipSyncStatus = useLipSync
      ? await this.services.lipSync.status()
      : { installed: false, reason: 'disabled for this request' };
    if (!lipSync.installed) {
      console.warn(`  Lip sync unavailable (${lipSync.reason ?? 'unknown reason'}), using static portraits`);
    }

    const bySpeaker = partitionBySpeaker(segments);
    const clips: Record<Speaker, string> = { A: '', B: '' };

    for (const speaker of ['A', 'B'] as const) {
      const portrait = speaker === 'A' ? ctx.request.portraitA : ctx.request.portraitB;
      const clipPath = path.join(ctx.workspace, `video_${speaker.toLowerCase()}.mp4`);
      const own = bySpeaker[speaker];

      if (own.length === 0) {
        console.warn(`  ${speakerName(script, speaker)} has no lines, holding a still portrait`);
        clips[speaker] = await call('media encoder', () =>
          media.createStillVideo(portrait, clipPath, { durationSec: totalDuration(script), fps: this.config.video.fps }),
        );
      } else {
        const track = await call('media encoder', () =>
          concatSpeakerTrack(own, path.join(ctx.workspace, `audio_${speaker.toLowerCase()}_combined.mp3`), media),
        );
        this.record(ctx, STAGE.animate, track);
        clips[speaker] = await this.animateSpeaker(portrait, track, clipPath, lipSync);
      }
      this.record(ctx, STAGE.animate, clips[speaker]);
    }
    return clips;
  }

  private async animateSpeaker(
    portraitPath: string,
    audioPath: string,
    outputPath: string,
    lipSync: LipSyncStatus,
  ): Promise<string> {
    if (lipSync.installed) {
      const candidate = outputPath.replace(/(\.\w+)?$/, '_lipsync$1');
      try {
        const animated = await withTimeout(
          signal => this.services.lipSync.animate({ portraitPath, audioPath, outputPath: candidate, signal }),
          this.config.stageTimeoutMs,
          STAGE.animate.name,
        );
        await fsp.rename(animated, outputPath);
        return outputPath;
      } catch (err) {
        console.warn(`  Lip sync failed (${describeError(err)}), using static portrait`);
      }
    }
    return call('media encoder', () =>
      this.services.media.createStillVideo(portraitPath, outputPath, { audioPath, fps: this.config.video.fps }),
    );
  }

  // ─── Stage 6 ───

  private async assembleVideo(
    ctx: RunContext,
    script: ConversationScript,
    segments: AudioSegment[],
    background: string,
    clips: Record<Speaker, string>,
  ): Promise<string> {
    const { media } = this.services;
    const [durationA, durationB] = await call('media encoder', () =>
      Promise.all([media.probeDuration(clips.A), media.probeDuration(clips.B)]),
    );
    // Each clip only covers its own speaker's lines; the frame must outlast the whole conversation.
    const durationSec = Math.max(durationA, durationB, totalDuration(script));

    const overlaid = await call('media encoder', () =>
      media.overlayPortraits(
        {
          background,
          videoA: clips.A,
          videoB: clips.B,
          layout: ctx.request.layout ?? this.config.video.layout,
          durationSec,
          frame: FRAME,
        },
        path.join(ctx.workspace, 'video_with_bg.mp4'),
      ),
    );

    const mixed = await call('media encoder', () =>
      combineAudio(buildMixSchedule(script, segments), path.join(ctx.workspace, 'combined_audio.m4a'), media),
    );

    const assembled = await call('media encoder', () =>
      media.replaceAudio(overlaid, mixed, path.join(ctx.workspace, 'assembled.mp4')),
    );
    this.record(ctx, STAGE.assemble, overlaid, mixed, assembled);
    return assembled;
  }

  // ─── Stage 7 ───

  private async renderFinal(ctx: RunContext, assembled: string): Promise<{ video: string; thumbnail: string }> {
    const { media } = this.services;
    const { video } = this.config;
    const finalPath = path.join(ctx.workspace, 'final.mp4');
    const thumbPath = path.join(ctx.workspace, 'thumbnail.jpg');

    await call('media encoder', () =>
      media.finalizeVideo(assembled, finalPath, {
        ...RESOLUTIONS[video.resolution],
        fps: video.fps,
        codec: video.codec,
        audioCodec: video.audioCodec,
      }),
    );
    const durationSec = await call('media encoder', () => media.probeDuration(finalPath));
    await call('media encoder', () =>
      media.extractThumbnail(finalPath, thumbPath, { atSec: Math.min(2, durationSec / 2), width: THUMBNAIL_WIDTH }),
    );

    return { video: finalPath, thumbnail: thumbPath };
  }

  private async publishResults(
    rendered: { video: string; thumbnail: string },
    outputPath: string,
    thumbnailPath: string,
  ): Promise<void> {
    await publish(rendered.thumbnail, thumbnailPath);
    try {
      await publish(rendered.video, outputPath);
    } catch (err) {
      await fsp.rm(thumbnailPath, { force: true });
      throw err;
    }
  }
}
