import fsp from 'fs/promises';
import path from 'path';
import { ParseError, ResourceError } from '../errors.js';
import { RawDialogueSchema } from '../schemas.js';
import type { ConversationScript, DialogueLine, Speaker } from '../types.js';

/** Silence inserted between consecutive lines, in seconds. */
export const LINE_PAUSE_SEC = 0.3;

/** ~150 words per minute. */
const WORDS_PER_SECOND = 2.5;
const MIN_LINE_DURATION_SEC = 1.0;

export function countWords(text: string): number {
  return text.trim().split(/\s+/).filter(Boolean).length;
}

/** Estimated duration for a line that has no audio yet. */
export function estimateLineDuration(text: string): number {
  return Math.max(MIN_LINE_DURATION_SEC, countWords(text) / WORDS_PER_SECOND);
}

/** Running start offsets: each line begins one pause after the previous one ends. */
export function layoutStarts(durations: readonly number[]): number[] {
  const starts: number[] = [];
  let cursor = 0;
  for (const duration of durations) {
    starts.push(cursor);
    cursor += duration + LINE_PAUSE_SEC;
  }
  return starts;
}

export interface ScriptLineInput {
  speaker: Speaker;
  text: string;
  emotion?: string;
}

/**
 * Build a script with word-count estimated timing, usable before any audio exists.
 */
export function buildScript(
  lines: readonly ScriptLineInput[],
  speakerAName: string,
  speakerBName: string,
  sceneDescription = '',
): ConversationScript {
  const durations = lines.map(line => estimateLineDuration(line.text));
  const starts = layoutStarts(durations);

  return createScript(
    lines.map((line, i) => ({
      speaker: line.speaker,
      name: line.speaker === 'A' ? speakerAName : speakerBName,
      text: line.text,
      start: starts[i],
      duration: durations[i],
      emotion: line.emotion ?? 'neutral',
    })),
    speakerAName,
    speakerBName,
    sceneDescription,
  );
}

export function createScript(
  lines: readonly DialogueLine[],
  speakerAName: string,
  speakerBName: string,
  sceneDescription = '',
): ConversationScript {
  let previousStart = 0;
  lines.forEach((line, i) => {
    if (line.speaker !== 'A' && line.speaker !== 'B') {
      throw new ParseError(`Line ${i} has unknown speaker "${String(line.speaker)}"`);
    }
    if (line.start < previousStart) {
      throw new ResourceError(`Line ${i} starts before the line preceding it`);
    }
    if (!(line.duration > 0)) {
      throw new ResourceError(`Line ${i} has a non-positive duration (${line.duration})`);
    }
    previousStart = line.start;
  });

  return {
    lines: Object.freeze(lines.map(line => Object.freeze({ ...line }))),
    speakerAName,
    speakerBName,
    sceneDescription,
  };
}

/** Last line's end, or 0 for an empty script. Derived on every call. */
export function totalDuration(script: ConversationScript): number {
  const last = script.lines[script.lines.length - 1];
  return last ? last.start + last.duration : 0;
}

export function speakerLines(script: ConversationScript, speaker: Speaker): DialogueLine[] {
  return script.lines.filter(line => line.speaker === speaker);
}

export function speakerName(script: ConversationScript, speaker: Speaker): string {
  return speaker === 'A' ? script.speakerAName : script.speakerBName;
}

/**
 * Parse a dialogue service reply into a script with estimated timing. The
 * reply is expected to contain one JSON object, possibly wrapped in prose or a
 * code fence.
 */
export function parseDialogueResponse(
  responseText: string,
  speakerAName: string,
  speakerBName: string,
): ConversationScript {
  const jsonMatch = responseText.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ParseError(`Could not find JSON in dialogue response: ${responseText.slice(0, 200)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (err) {
    throw new ParseError(
      `Failed to parse dialogue JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const parsed = RawDialogueSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ParseError(
      `Dialogue JSON has an unexpected shape: ${first.path.join('.')} ${first.message}`,
    );
  }

  const usable = parsed.data.lines.filter(line => line.text.trim().length > 0);
  if (usable.length < parsed.data.lines.length) {
    console.warn(`Dropped ${parsed.data.lines.length - usable.length} dialogue line(s) with no text`);
  }

  return buildScript(
    usable.map(line => ({ speaker: line.speaker, text: line.text.trim(), emotion: line.emotion })),
    speakerAName,
    speakerBName,
    parsed.data.scene_description,
  );
}

export function scriptToJSON(script: ConversationScript) {
  return {
    speaker_a_name: script.speakerAName,
    speaker_b_name: script.speakerBName,
    total_duration: totalDuration(script),
    scene_description: script.sceneDescription,
    lines: script.lines.map(line => ({ ...line })),
  };
}

export async function saveScript(script: ConversationScript, outputPath: string): Promise<string> {
  await fsp.mkdir(path.dirname(outputPath), { recursive: true });
  await fsp.writeFile(outputPath, JSON.stringify(scriptToJSON(script), null, 2), 'utf-8');
  return outputPath;
}
