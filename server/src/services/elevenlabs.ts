import { ElevenLabsClient } from 'elevenlabs';
import fsp from 'fs/promises';
import path from 'path';
import { parseAdjustment } from '../config.js';
import { describeError } from '../errors.js';
import type { MediaService, SpeechRequest, SpeechService } from './collaborators.js';
import { withRetry } from './retry.js';

export interface VoicePreset {
  id: string;
  gender: 'male' | 'female';
}

// Named presets for the voice option; anything else is passed through as a voice ID.
export const VOICE_PRESETS: Record<string, VoicePreset> = {
  george: { id: 'JBFqnCBsd6RMkjVDRZzb', gender: 'male' },
  sarah: { id: 'EXAVITQu4vr4xnSDxMaL', gender: 'female' },
  daniel: { id: 'onwK4e9ZLuTAKqWW03F9', gender: 'male' },
  charlotte: { id: 'XB0fDUnXU5powFXDhCwa', gender: 'female' },
};

export interface VoiceOption {
  name: string;
  /** What to send as `voice_a` / `voice_b`. */
  voice: string;
  gender: string | null;
  preset: boolean;
}

interface AccountVoice {
  voice_id: string;
  name?: string;
  labels?: Record<string, string>;
}

const MODEL_ID = 'eleven_turbo_v2_5';
const OUTPUT_FORMAT = 'mp3_44100_128';

export function resolveVoice(voice: string): string {
  return VOICE_PRESETS[voice.toLowerCase()]?.id ?? voice;
}

/** Presets first, then the account's own voices that no preset already covers. */
export function mergeVoices(account: readonly AccountVoice[]): VoiceOption[] {
  const options: VoiceOption[] = Object.entries(VOICE_PRESETS).map(([name, preset]) => ({
    name,
    voice: name,
    gender: preset.gender,
    preset: true,
  }));
  const known = new Set(Object.values(VOICE_PRESETS).map(p => p.id));

  for (const voice of account) {
    if (known.has(voice.voice_id)) continue;
    known.add(voice.voice_id);
    options.push({
      name: voice.name ?? voice.voice_id,
      voice: voice.voice_id,
      gender: voice.labels?.gender ?? null,
      preset: false,
    });
  }
  return options;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  if (typeof chunk === 'string') return Buffer.from(chunk);
  throw new TypeError(`Unexpected audio chunk type: ${typeof chunk}`);
}

/** Save the SDK's audio response (Buffer, Node stream or web stream) to a file */
async function saveStreamToFile(audio: unknown, outputPath: string): Promise<void> {
  await fsp.mkdir(path.dirname(outputPath), { recursive: true });

  if (Buffer.isBuffer(audio) || audio instanceof Uint8Array) {
    await fsp.writeFile(outputPath, audio);
    return;
  }

  if (isAsyncIterable(audio)) {
    const chunks: Buffer[] = [];
    for await (const chunk of audio) {
      chunks.push(toBuffer(chunk));
    }
    await fsp.writeFile(outputPath, Buffer.concat(chunks));
    return;
  }

  if (audio instanceof ReadableStream) {
    const reader = audio.getReader();
    const chunks: Buffer[] = [];
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(toBuffer(value));
    }
    await fsp.writeFile(outputPath, Buffer.concat(chunks));
    return;
  }

  throw new TypeError('Unsupported audio response from ElevenLabs');
}

/**
 * Text-to-speech through ElevenLabs. Rate and volume adjustments are applied
 * afterwards with ffmpeg; the measured duration comes from the final file.
 */
export class ElevenLabsSpeechService implements SpeechService {
  private readonly client: ElevenLabsClient;

  constructor(apiKey: string, private readonly media: MediaService) {
    this.client = new ElevenLabsClient({ apiKey });
  }

  async synthesize(request: SpeechRequest): Promise<{ filePath: string; durationSec: number }> {
    const voiceId = resolveVoice(request.voice);
    const tempo = parseAdjustment(request.rate);
    const gain = parseAdjustment(request.volume);
    const needsAdjust = tempo !== 1 || gain !== 1;

    const rawPath = needsAdjust
      ? request.outputPath.replace(/(\.\w+)?$/, '_raw$1')
      : request.outputPath;

    const audio = await withRetry(
      () =>
        this.client.textToSpeech.convert(voiceId, {
          text: request.text,
          model_id: MODEL_ID,
          output_format: OUTPUT_FORMAT,
        }),
      { label: 'ElevenLabs' },
    );
    await saveStreamToFile(audio, rawPath);

    let filePath = rawPath;
    if (needsAdjust) {
      filePath = await this.media.adjustAudio(rawPath, request.outputPath, { tempo, gain });
      await fsp.rm(rawPath, { force: true });
    }

    const durationSec = await this.media.probeDuration(filePath);
    return { filePath, durationSec };
  }

  async listVoices(): Promise<VoiceOption[]> {
    try {
      const { voices } = await withRetry(() => this.client.voices.getAll(), { label: 'ElevenLabs' });
      return mergeVoices(voices);
    } catch (err) {
      console.warn(`Could not list ElevenLabs voices (${describeError(err)}), offering presets only`);
      return mergeVoices([]);
    }
  }
}
