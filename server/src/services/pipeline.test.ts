import fs from 'fs';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FakeDialogue,
  FakeImages,
  FakeLipSync,
  delay,
  dialogueJson,
  fakeServices,
  makeTempDir,
  testConfig,
  writePortraits,
  type FakeServices,
} from '../test/fakes.js';
import type { AppConfig } from '../config.js';
import type { DialogueRequest } from './collaborators.js';
import type { GenerationRequest, StageUpdate } from '../types.js';
import { ConversationPipeline, withTimeout } from './pipeline.js';

describe('ConversationPipeline', () => {
  let root: string;
  let config: AppConfig;
  let request: GenerationRequest;
  let outputPath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    config = testConfig(root);
    request = { ...(await writePortraits(root)), scenario: 'Two friends talk about a podcast they love' };
    outputPath = path.join(config.paths.outputsDir, 'job-1.mp4');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  function run(services: FakeServices, overrides: Partial<GenerationRequest> = {}, cfg = config) {
    const stages: StageUpdate[] = [];
    const pipeline = new ConversationPipeline(cfg, services);
    const result = pipeline.generate(
      { ...request, ...overrides },
      { jobId: 'job-1', outputPath, onStage: stage => stages.push(stage) },
    );
    return { result, stages };
  }

  const workspace = () => path.join(config.paths.dataDir, 'jobs', 'job-1');
  const thumbnailPath = () => path.join(config.paths.outputsDir, 'job-1_thumb.jpg');

  describe('a successful run', () => {
    it('reports all seven stages in order and publishes the video and thumbnail', async () => {
      const services = fakeServices();
      const { result, stages } = run(services);
      const outcome = await result;

      expect(outcome.success).toBe(true);
      expect(outcome.error).toBeNull();
      expect(outcome.outputPath).toBe(outputPath);
      expect(outcome.thumbnailPath).toBe(thumbnailPath());
      expect(fs.readFileSync(outputPath, 'utf-8')).toBe('finalizeVideo');
      expect(fs.readFileSync(thumbnailPath(), 'utf-8')).toBe('extractThumbnail');

      expect(stages).toEqual([
        { index: 1, name: 'Validating Inputs', percent: 0 },
        { index: 2, name: 'Generating Dialogue', percent: 14 },
        { index: 3, name: 'Synthesizing Speech', percent: 28 },
        { index: 4, name: 'Creating Background', percent: 42 },
        { index: 5, name: 'Animating Portraits', percent: 56 },
        { index: 6, name: 'Assembling Video', percent: 70 },
        { index: 7, name: 'Finalizing', percent: 85 },
      ]);
    });

    it('re-times the script from the measured speech durations', async () => {
      const services = fakeServices();
      const outcome = await run(services).result;
      if (!outcome.success) throw new Error(outcome.error);

      // FakeSpeech: one second per word; lines have 3, 1 and 2 words
      const lines = outcome.script.lines;
      expect(lines.map(l => l.duration)).toEqual([3, 1, 2]);
      expect(lines[1].start).toBeCloseTo(3.3);
      expect(lines[2].start).toBeCloseTo(4.6);
      expect(services.media.mixes).toEqual([
        [
          { filePath: path.join(workspace(), 'audio', 'line_000_A.mp3'), delayMs: 0 },
          { filePath: path.join(workspace(), 'audio', 'line_001_B.mp3'), delayMs: 3300 },
          { filePath: path.join(workspace(), 'audio', 'line_002_A.mp3'), delayMs: 4600 },
        ],
      ]);
    });

    it('passes the request and configuration to the collaborators', async () => {
      const services = fakeServices();
      await run(services, { speakerAName: 'Rosa', voiceB: 'charlotte', targetDurationSec: 20 }).result;

      expect(services.dialogue.requests).toEqual<DialogueRequest[]>([
        {
          scenario: request.scenario,
          speakerAName: 'Rosa',
          speakerBName: 'Sam',
          targetDurationSec: 20,
          temperature: 0.7,
          exchanges: 4,
        },
      ]);
      expect(services.speech.requests.map(r => [r.voice, r.rate, r.volume])).toEqual([
        ['george', '+0%', '+0%'],
        ['charlotte', '+0%', '+0%'],
        ['george', '+0%', '+0%'],
      ]);
      // "podcast" selects the studio preset
      expect(services.images.requests[0].prompt).toMatch(/^Professional podcast studio/);
      expect(services.images.requests[0]).toMatchObject({ width: 1280, height: 720 });
    });

    it('concatenates only the speaker with several lines', async () => {
      const services = fakeServices();
      await run(services).result;

      expect(services.media.called('concatAudio')).toEqual([
        { method: 'concatAudio', outputPath: path.join(workspace(), 'audio_a_combined.mp3') },
      ]);
      expect(services.lipSync.animated).toEqual([request.portraitA, request.portraitB]);
    });

    it('covers the whole conversation in the overlay and thumbnails at two seconds', async () => {
      const services = fakeServices();
      await run(services, { layout: 'conversation' }).result;

      // clips probe at 4 s, the conversation runs 6.6 s
      expect(services.media.overlays).toHaveLength(1);
      expect(services.media.overlays[0].layout).toBe('conversation');
      expect(services.media.overlays[0].durationSec).toBeCloseTo(6.6);
      expect(services.media.thumbnails).toEqual([{ atSec: 2, width: 320 }]);
    });

    it('keeps the workspace and records intermediate files by stage', async () => {
      const outcome = await run(fakeServices()).result;

      expect(fs.existsSync(path.join(workspace(), 'script.json'))).toBe(true);
      expect(fs.existsSync(path.join(workspace(), 'script_timed.json'))).toBe(true);
      expect(outcome.intermediateFiles['Generating Dialogue']).toEqual([path.join(workspace(), 'script.json')]);
      expect(outcome.intermediateFiles['Creating Background']).toEqual([path.join(workspace(), 'background.png')]);
    });
  });

  describe('fallbacks', () => {
    it('completes with a placeholder when the background service always fails', async () => {
      const services = fakeServices({ images: new FakeImages(new Error('content policy')) });
      const outcome = await run(services).result;

      expect(outcome.success).toBe(true);
      expect(services.media.solidImages).toEqual([{ width: 1280, height: 720, color: '#1e1e28' }]);
      expect(fs.existsSync(outputPath)).toBe(true);
    });

    it('resizes a supplied background instead of generating one', async () => {
      const services = fakeServices();
      const backgroundPath = path.join(root, 'inputs', 'a.png');
      await run(services, { backgroundPath }).result;

      expect(services.images.requests).toEqual([]);
      expect(services.media.called('resizeImage')).toHaveLength(1);
    });

    it('generates a background when the supplied one is missing', async () => {
      const services = fakeServices();
      await run(services, { backgroundPath: path.join(root, 'nope.png') }).result;

      expect(services.images.requests).toHaveLength(1);
    });

    it('completes with static portraits when lip sync is not installed', async () => {
      const services = fakeServices({ lipSync: new FakeLipSync(false) });
      const outcome = await run(services).result;

      expect(outcome.success).toBe(true);
      expect(services.lipSync.animated).toEqual([]);
      expect(services.media.stillVideos).toEqual([
        { audioPath: path.join(workspace(), 'audio_a_combined.mp3'), fps: 25 },
        { audioPath: path.join(workspace(), 'audio', 'line_001_B.mp3'), fps: 25 },
      ]);
    });

    it('falls back per speaker when animation fails', async () => {
      const services = fakeServices({ lipSync: new FakeLipSync(true, new Error('CUDA out of memory')) });
      const outcome = await run(services).result;

      expect(outcome.success).toBe(true);
      expect(services.lipSync.animated).toHaveLength(2);
      expect(services.media.stillVideos).toHaveLength(2);
    });

    it('skips lip sync when the request turns it off', async () => {
      const services = fakeServices();
      await run(services, { useLipSync: false }).result;

      expect(services.lipSync.animated).toEqual([]);
      expect(services.media.stillVideos).toHaveLength(2);
    });

    it('holds a still for the whole conversation when a speaker has no lines', async () => {
      const services = fakeServices({
        dialogue: new FakeDialogue(dialogueJson([{ speaker: 'A', text: 'Just me talking' }])),
      });
      const outcome = await run(services).result;

      expect(outcome.success).toBe(true);
      expect(services.lipSync.animated).toEqual([request.portraitA]);
      expect(services.media.stillVideos).toEqual([{ durationSec: 3, fps: 25 }]);
      // a single line is played as-is, no mix
      expect(services.media.mixes).toEqual([]);
    });
  });

  describe('failures', () => {
    it('fails without any output when the dialogue reply is not JSON', async () => {
      const services = fakeServices({ dialogue: new FakeDialogue('I would rather not.') });
      const { result, stages } = run(services);
      const outcome = await result;

      expect(outcome).toMatchObject({
        success: false,
        outputPath: null,
        thumbnailPath: null,
        script: null,
        error: 'Could not find JSON in dialogue response: I would rather not.',
      });
      expect(stages.map(s => s.name)).toEqual(['Validating Inputs', 'Generating Dialogue']);
      expect(services.speech.requests).toEqual([]);
      expect(fs.existsSync(outputPath)).toBe(false);
      expect(fs.existsSync(thumbnailPath())).toBe(false);
    });

    it('fails when the reply has no usable lines', async () => {
      const services = fakeServices({ dialogue: new FakeDialogue(dialogueJson([{ speaker: 'B', text: '  ' }])) });
      const outcome = await run(services).result;

      expect(outcome.error).toBe('Dialogue service returned no usable lines');
    });

    it('reports every validation issue and creates no workspace', async () => {
      const services = fakeServices();
      const missing = path.join(root, 'missing.png');
      const outcome = await run(services, { portraitA: missing, scenario: 'Hi' }).result;

      expect(outcome.error).toBe(
        `Validation failed: Portrait A not found: ${missing}; Scenario description is too short (min 10 characters)`,
      );
      expect(services.dialogue.requests).toEqual([]);
      expect(fs.existsSync(workspace())).toBe(false);
    });

    it('fails validation when a credential is missing', async () => {
      const cfg = testConfig(root, { OPENAI_API_KEY: '' });
      const outcome = await run(fakeServices(), {}, cfg).result;

      expect(outcome.error).toBe('Validation failed: OPENAI_API_KEY not set (needed for scene generation)');
    });

    it('names the collaborator that failed', async () => {
      const services = fakeServices({ dialogue: new FakeDialogue(new Error('quota exceeded')) });
      const outcome = await run(services).result;

      expect(outcome.error).toBe('dialogue service failed: quota exceeded');
    });

    it('publishes nothing when encoding fails', async () => {
      const services = fakeServices();
      services.media.failOn = 'finalizeVideo';
      const outcome = await run(services).result;

      expect(outcome.error).toBe('media encoder failed: finalizeVideo exploded');
      expect(services.media.thumbnails).toEqual([]);
      expect(fs.existsSync(outputPath)).toBe(false);
    });

    it('fails a stage that exceeds the timeout', async () => {
      const cfg = testConfig(root, { STAGE_TIMEOUT_MS: '50' });
      // arrives too late, and would not parse anyway
      const services = fakeServices({ dialogue: new FakeDialogue(dialogueJson([]), 300) });
      const outcome = await run(services, {}, cfg).result;

      expect(outcome.error).toBe('Stage "Generating Dialogue" timed out after 50 ms');
      expect(services.speech.requests).toEqual([]);
      expect(fs.existsSync(outputPath)).toBe(false);
    });

    it('never publishes a final render that finishes after its timeout', async () => {
      const cfg = testConfig(root, { STAGE_TIMEOUT_MS: '100' });
      const services = fakeServices();
      services.media.latencyMs.finalizeVideo = 250;
      const outcome = await run(services, {}, cfg).result;

      expect(outcome.error).toBe('Stage "Finalizing" timed out after 100 ms');

      await delay(400);
      expect(fs.readFileSync(path.join(workspace(), 'thumbnail.jpg'), 'utf-8')).toBe('extractThumbnail');
      expect(fs.existsSync(outputPath)).toBe(false);
      expect(fs.existsSync(thumbnailPath())).toBe(false);
    });
  });

  describe('late results after a timeout', () => {
    it('keeps the static clip when lip sync finishes too late', async () => {
      const cfg = testConfig(root, { STAGE_TIMEOUT_MS: '100' });
      const services = fakeServices({ lipSync: new FakeLipSync(true, undefined, 250) });
      const outcome = await run(services, {}, cfg).result;

      expect(outcome.success).toBe(true);
      expect(services.media.stillVideos).toHaveLength(2);
      expect(services.lipSync.signals.map(s => s.aborted)).toEqual([true, true]);

      await delay(400);
      const clipB = path.join(workspace(), 'video_b.mp4');
      expect(fs.readFileSync(clipB, 'utf-8')).toBe('createStillVideo');
      expect(fs.readFileSync(path.join(workspace(), 'video_b_lipsync.mp4'), 'utf-8')).toBe(
        `lipsync: ${path.join(workspace(), 'audio', 'line_001_B.mp3')}`,
      );
    });

    it('keeps the placeholder when the background image arrives too late', async () => {
      const cfg = testConfig(root, { STAGE_TIMEOUT_MS: '100' });
      const services = fakeServices({ images: new FakeImages(undefined, 250) });
      const outcome = await run(services, {}, cfg).result;

      expect(outcome.success).toBe(true);
      expect(services.media.solidImages).toHaveLength(1);
      expect(services.images.requests[0].signal?.aborted).toBe(true);

      await delay(400);
      expect(fs.readFileSync(path.join(workspace(), 'background.png'), 'utf-8')).toBe('createSolidImage');
    });

    it('moves a lip-synced clip into place when it arrives in time', async () => {
      const services = fakeServices();
      await run(services).result;

      const clipA = path.join(workspace(), 'video_a.mp4');
      expect(services.media.overlays[0].videoA).toBe(clipA);
      expect(fs.readFileSync(clipA, 'utf-8')).toBe(
        `lipsync: ${path.join(workspace(), 'audio_a_combined.mp3')}`,
      );
      expect(fs.existsSync(path.join(workspace(), 'video_a_lipsync.mp4'))).toBe(false);
    });
  });
});

describe('withTimeout', () => {
  it('aborts the work with the timeout failure', async () => {
    let seen: AbortSignal | undefined;
    const result = withTimeout(
      signal => {
        seen = signal;
        return delay(200).then(() => 'late');
      },
      20,
      'Creating Background',
    );

    await expect(result).rejects.toThrow('Stage "Creating Background" timed out after 20 ms');
    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(Error);
  });

  it('passes a live signal through when there is no limit', async () => {
    const result = await withTimeout(async signal => signal.aborted, 0, 'Finalizing');
    expect(result).toBe(false);
  });
});
