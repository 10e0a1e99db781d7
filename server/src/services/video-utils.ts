import ffmpeg from 'fluent-ffmpeg';
import fsp from 'fs/promises';
import path from 'path';
import { execSync } from 'child_process';
import type { AudioPlacement, VideoLayout, VideoResolution } from '../types.js';
import type {
  FinalizeOptions,
  FrameSize,
  MediaService,
  OverlayOptions,
  StillVideoOptions,
} from './collaborators.js';

// Verify ffmpeg is available at startup
export function checkFfmpeg(): void {
  try {
    execSync('ffmpeg -version', { stdio: 'ignore' });
  } catch {
    throw new Error(
      'ffmpeg is not installed or not found in PATH. ' +
      'Install it with: brew install ffmpeg (macOS) or apt install ffmpeg (Linux)',
    );
  }
}

export const FRAME: FrameSize = { width: 1280, height: 720 };

export const RESOLUTIONS: Record<VideoResolution, FrameSize> = {
  '480p': { width: 854, height: 480 },
  '720p': { width: 1280, height: 720 },
  '1080p': { width: 1920, height: 1080 },
};

interface PortraitPlacement {
  width: number;
  xA: string;
  xB: string;
  y: string;
}

export const PORTRAIT_LAYOUTS: Record<VideoLayout, PortraitPlacement> = {
  // anchored bottom-left / bottom-right
  'side-by-side': { width: 300, xA: '100', xB: 'W-w-100', y: 'H-h-50' },
  // symmetric around the centre line
  conversation: { width: 350, xA: 'W/2-w-30', xB: 'W/2+30', y: 'H-h-50' },
};

// ─── Filter graphs (pure, kept separate for testing) ───

/** Inputs: 0 = background still, 1 = speaker A clip, 2 = speaker B clip. */
export function buildOverlayFilter(layout: VideoLayout, durationSec: number, frame: FrameSize): string {
  const p = PORTRAIT_LAYOUTS[layout];
  return [
    `[0:v]loop=loop=-1:size=1:start=0,trim=duration=${durationSec},scale=${frame.width}:${frame.height},setsar=1[bg]`,
    `[1:v]scale=${p.width}:-1[a]`,
    `[2:v]scale=${p.width}:-1[b]`,
    `[bg][a]overlay=${p.xA}:${p.y}[tmp]`,
    `[tmp][b]overlay=${p.xB}:${p.y}[v]`,
  ].join(';');
}

/** Delay every input to its start offset, then sum without level normalization. */
export function buildMixFilter(placements: readonly AudioPlacement[]): string {
  const delayed = placements.map((p, i) => `[${i}:a]adelay=${p.delayMs}|${p.delayMs}[a${i}]`);
  const inputs = placements.map((_, i) => `[a${i}]`).join('');
  return [...delayed, `${inputs}amix=inputs=${placements.length}:duration=longest:normalize=0[out]`].join(';');
}

/** Fit inside the frame, preserving aspect ratio, letterboxed. */
export function buildLetterboxFilter(size: FrameSize): string {
  const { width, height } = size;
  return `scale=${width}:${height}:force_original_aspect_ratio=decrease,pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2`;
}

export function buildAdjustFilter(adjust: { tempo: number; gain: number }): string {
  const filters: string[] = [];
  if (adjust.tempo !== 1) filters.push(`atempo=${adjust.tempo}`);
  if (adjust.gain !== 1) filters.push(`volume=${adjust.gain}`);
  return filters.join(',');
}

function concatListEntry(filePath: string): string {
  return `file '${path.resolve(filePath).replace(/'/g, "'\\''")}'`;
}

// ─── fluent-ffmpeg execution ───

async function run(command: ffmpeg.FfmpegCommand, outputPath: string): Promise<string> {
  await fsp.mkdir(path.dirname(outputPath), { recursive: true });

  return new Promise((resolve, reject) => {
    command
      .output(outputPath)
      .on('end', () => resolve(outputPath))
      .on('error', (err: Error) => reject(err))
      .run();
  });
}

/** Media operations backed by the ffmpeg binary. */
export class FfmpegMediaService implements MediaService {
  /** Get media duration in seconds using ffprobe */
  probeDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) return reject(err);
        resolve(metadata.format.duration || 0);
      });
    });
  }

  async concatAudio(inputs: string[], outputPath: string): Promise<string> {
    if (inputs.length === 0) throw new Error('No audio files to concatenate');

    const listFile = outputPath.replace(/(\.\w+)?$/, '_list.txt');
    await fsp.mkdir(path.dirname(listFile), { recursive: true });
    await fsp.writeFile(listFile, inputs.map(concatListEntry).join('\n') + '\n', 'utf-8');

    try {
      return await run(
        ffmpeg(listFile).inputOptions(['-f', 'concat', '-safe', '0']).outputOptions(['-c', 'copy']),
        outputPath,
      );
    } finally {
      await fsp.rm(listFile, { force: true });
    }
  }

  async mixAudio(placements: AudioPlacement[], outputPath: string): Promise<string> {
    if (placements.length === 0) throw new Error('No audio files to mix');

    const command = ffmpeg();
    for (const p of placements) command.input(p.filePath);
    return run(
      command
        .complexFilter(buildMixFilter(placements))
        .outputOptions(['-map', '[out]', '-c:a', 'aac']),
      outputPath,
    );
  }

  adjustAudio(inputPath: string, outputPath: string, adjust: { tempo: number; gain: number }): Promise<string> {
    const filter = buildAdjustFilter(adjust);
    const command = ffmpeg(inputPath);
    if (filter) command.audioFilters(filter);
    return run(command, outputPath);
  }

  createSolidImage(outputPath: string, options: FrameSize & { color: string }): Promise<string> {
    const color = options.color.replace(/^#/, '0x');
    return run(
      ffmpeg()
        .input(`color=c=${color}:s=${options.width}x${options.height}`)
        .inputFormat('lavfi')
        .outputOptions(['-frames:v', '1']),
      outputPath,
    );
  }

  resizeImage(inputPath: string, outputPath: string, size: FrameSize): Promise<string> {
    return run(
      ffmpeg(inputPath).outputOptions(['-vf', `scale=${size.width}:${size.height}`, '-frames:v', '1']),
      outputPath,
    );
  }

  async createStillVideo(imagePath: string, outputPath: string, options: StillVideoOptions): Promise<string> {
    const command = ffmpeg().input(imagePath).inputOptions(['-loop', '1']);
    const video = ['-c:v', 'libx264', '-tune', 'stillimage', '-pix_fmt', 'yuv420p', '-r', String(options.fps)];

    if (options.audioPath) {
      command.input(options.audioPath);
      return run(command.outputOptions([...video, '-c:a', 'aac', '-b:a', '192k', '-shortest']), outputPath);
    }
    if (!options.durationSec || options.durationSec <= 0) {
      throw new Error('A still video needs either an audio track or a positive duration');
    }
    return run(command.outputOptions([...video, '-t', String(options.durationSec), '-an']), outputPath);
  }

  overlayPortraits(options: OverlayOptions, outputPath: string): Promise<string> {
    return run(
      ffmpeg()
        .input(options.background)
        .input(options.videoA)
        .input(options.videoB)
        .complexFilter(buildOverlayFilter(options.layout, options.durationSec, options.frame))
        .outputOptions([
          '-map', '[v]',
          '-c:v', 'libx264',
          '-preset', 'medium',
          '-crf', '23',
          '-t', String(options.durationSec),
        ]),
      outputPath,
    );
  }

  replaceAudio(videoPath: string, audioPath: string, outputPath: string): Promise<string> {
    return run(
      ffmpeg()
        .input(videoPath)
        .input(audioPath)
        .outputOptions(['-c:v', 'copy', '-c:a', 'aac', '-map', '0:v:0', '-map', '1:a:0', '-shortest']),
      outputPath,
    );
  }

  finalizeVideo(inputPath: string, outputPath: string, options: FinalizeOptions): Promise<string> {
    return run(
      ffmpeg(inputPath).outputOptions([
        '-vf', buildLetterboxFilter(options),
        '-c:v', options.codec,
        '-preset', 'medium',
        '-crf', '23',
        '-c:a', options.audioCodec,
        '-b:a', '192k',
        '-r', String(options.fps),
      ]),
      outputPath,
    );
  }

  extractThumbnail(videoPath: string, outputPath: string, options: { atSec: number; width: number }): Promise<string> {
    return run(
      ffmpeg(videoPath)
        .seekInput(options.atSec)
        .outputOptions(['-frames:v', '1', '-vf', `scale=${options.width}:-1`]),
      outputPath,
    );
  }
}
