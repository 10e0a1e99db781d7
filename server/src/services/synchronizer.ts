import { ResourceError } from '../errors.js';
import type { AudioPlacement, AudioSegment, ConversationScript, Speaker } from '../types.js';
import type { MediaService } from './collaborators.js';
import { createScript, layoutStarts } from './script.js';

/**
 * Re-time a script from the measured speech durations, re-deriving the start
 * offsets with the same inter-line pause.
 */
export function reconcileTimings(
  script: ConversationScript,
  measuredDurations: readonly number[],
): ConversationScript {
  if (measuredDurations.length !== script.lines.length) {
    throw new ResourceError(
      `Expected ${script.lines.length} audio durations, got ${measuredDurations.length}`,
    );
  }
  const starts = layoutStarts(measuredDurations);

  return createScript(
    script.lines.map((line, i) => ({ ...line, start: starts[i], duration: measuredDurations[i] })),
    script.speakerAName,
    script.speakerBName,
    script.sceneDescription,
  );
}

/** Segments of one speaker, in original line order. */
export function partitionBySpeaker(segments: readonly AudioSegment[]): Record<Speaker, AudioSegment[]> {
  const sorted = [...segments].sort((a, b) => a.lineIndex - b.lineIndex);
  return {
    A: sorted.filter(s => s.speaker === 'A'),
    B: sorted.filter(s => s.speaker === 'B'),
  };
}

/**
 * Concatenate one speaker's segments back to back. A single segment is
 * returned as-is without touching the encoder.
 */
export async function concatSpeakerTrack(
  segments: readonly AudioSegment[],
  outputPath: string,
  media: MediaService,
): Promise<string> {
  if (segments.length === 0) {
    throw new ResourceError('No audio segments to concatenate');
  }
  if (segments.length === 1) return segments[0].filePath;
  return media.concatAudio(segments.map(s => s.filePath), outputPath);
}

/** Place every line's audio at its script start offset. */
export function buildMixSchedule(
  script: ConversationScript,
  segments: readonly AudioSegment[],
): AudioPlacement[] {
  const byLine = new Map(segments.map(s => [s.lineIndex, s]));

  return script.lines.map((line, i) => {
    const segment = byLine.get(i);
    if (!segment) {
      throw new ResourceError(`Missing audio for line ${i} (${line.name}: "${line.text.slice(0, 40)}")`);
    }
    return { filePath: segment.filePath, delayMs: Math.round(line.start * 1000) };
  });
}

/**
 * Mix delayed tracks into one conversation track. Lines keep their script
 * positions, so overlapping or interleaved speech stays aligned.
 */
export async function combineAudio(
  placements: readonly AudioPlacement[],
  outputPath: string,
  media: MediaService,
): Promise<string> {
  if (placements.length === 0) {
    throw new ResourceError('No audio segments to combine');
  }
  if (placements.length === 1) return placements[0].filePath;
  return media.mixAudio([...placements], outputPath);
}
