import OpenAI from 'openai';
import fsp from 'fs/promises';
import path from 'path';
import type { ImageRequest, ImageService, MediaService } from './collaborators.js';
import { withRetry } from './retry.js';

export type ScenePresetName = 'office' | 'cafe' | 'park' | 'studio' | 'living_room';

export interface ScenePreset {
  prompt: string;
  negativePrompt: string;
}

const NEGATIVE_PROMPT = 'people, faces, blur, distortion, text, watermark';

export const SCENE_PRESETS: Record<ScenePresetName, ScenePreset> = {
  office: {
    prompt: 'Modern corporate office meeting room, two empty chairs facing each other, professional lighting, wooden conference table, glass walls, city view background, photorealistic, high quality, 16:9 aspect ratio',
    negativePrompt: NEGATIVE_PROMPT,
  },
  cafe: {
    prompt: 'Cozy coffee shop interior, warm lighting, two comfortable armchairs, small round table between them, bookshelves in background, plants, modern cafe aesthetic, photorealistic, 16:9 aspect ratio',
    negativePrompt: NEGATIVE_PROMPT,
  },
  park: {
    prompt: 'Beautiful city park on sunny day, park bench for two people, green trees, walking path, blue sky with clouds, natural lighting, photorealistic, 16:9 aspect ratio',
    negativePrompt: NEGATIVE_PROMPT,
  },
  studio: {
    prompt: 'Professional podcast studio, modern studio setup, two microphones on stands, acoustic panels on walls, soft professional lighting, minimalist design, photorealistic, 16:9 aspect ratio',
    negativePrompt: NEGATIVE_PROMPT,
  },
  living_room: {
    prompt: 'Modern living room interior, comfortable sofa, ambient lighting, large windows, plants, minimalist furniture, warm atmosphere, photorealistic, 16:9 aspect ratio',
    negativePrompt: NEGATIVE_PROMPT,
  },
};

// Checked in order; the first set with a hit wins.
const PRESET_KEYWORDS: Array<[ScenePresetName, string[]]> = [
  ['office', ['office', 'work', 'business', 'meeting', 'corporate']],
  ['cafe', ['coffee', 'cafe', 'tea', 'lunch', 'breakfast']],
  ['park', ['park', 'outdoor', 'nature', 'walk', 'outside']],
  ['studio', ['podcast', 'interview', 'studio', 'recording']],
  ['living_room', ['home', 'living', 'casual', 'friend']],
];

/**
 * Pick a scene preset from the scenario text. Matching is by substring, so
 * "workshop" counts as "work". Falls back to the studio.
 */
export function selectScenePreset(scenario: string): ScenePresetName {
  const lower = scenario.toLowerCase();
  for (const [preset, keywords] of PRESET_KEYWORDS) {
    if (keywords.some(word => lower.includes(word))) return preset;
  }
  return 'studio';
}

const IMAGE_MODEL = 'gpt-image-1';
const IMAGE_SIZE = '1536x1024';

/**
 * Background generation through the OpenAI Images API. The API has no
 * negative prompt, so exclusions are folded into the prompt text; the result
 * is resized to the requested frame with ffmpeg.
 */
export class OpenAISceneService implements ImageService {
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly media: MediaService) {
    this.client = new OpenAI({ apiKey });
  }

  async generate(request: ImageRequest): Promise<string> {
    const prompt = request.negativePrompt
      ? `${request.prompt}. Do not include: ${request.negativePrompt}.`
      : request.prompt;

    const response = await withRetry(
      () =>
        this.client.images.generate(
          { model: IMAGE_MODEL, prompt, size: IMAGE_SIZE, n: 1 },
          { signal: request.signal },
        ),
      { label: 'OpenAI', maxRetries: 2, baseDelayMs: 1500 },
    );

    const b64 = response.data?.[0]?.b64_json;
    if (!b64) throw new Error('Image generation returned no image data');
    request.signal?.throwIfAborted();

    const rawPath = request.outputPath.replace(/(\.\w+)?$/, '_raw.png');
    await fsp.mkdir(path.dirname(rawPath), { recursive: true });
    await fsp.writeFile(rawPath, Buffer.from(b64, 'base64'));

    const resized = await this.media.resizeImage(rawPath, request.outputPath, {
      width: request.width,
      height: request.height,
    });
    await fsp.rm(rawPath, { force: true });
    return resized;
  }
}
