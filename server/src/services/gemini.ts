import { GoogleGenerativeAI } from '@google/generative-ai';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { DialogueRequest, DialogueService } from './collaborators.js';
import { withRetry } from './retry.js';

// ─── Load prompt template from external file at startup ───

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DIALOGUE_PROMPT_TEMPLATE = fs.readFileSync(
  path.resolve(__dirname, '../prompts/dialogue.txt'),
  'utf-8',
);

const MAX_OUTPUT_TOKENS = 2048;

/** ~8 seconds per exchange, never fewer than 4. */
export function exchangeCount(targetDurationSec: number): number {
  return Math.max(4, Math.floor(targetDurationSec / 8));
}

export function buildDialoguePrompt(request: DialogueRequest): string {
  const values: Record<string, string> = {
    SCENARIO: request.scenario,
    SPEAKER_A: request.speakerAName,
    SPEAKER_B: request.speakerBName,
    TARGET_DURATION: String(request.targetDurationSec),
    EXCHANGES: String(request.exchanges),
  };
  return DIALOGUE_PROMPT_TEMPLATE.replace(/\{([A-Z_]+)\}/g, (match, key: string) => values[key] ?? match);
}

export class GeminiDialogueService implements DialogueService {
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly model: string) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: DialogueRequest): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
      },
    });

    const prompt = buildDialoguePrompt(request);
    const result = await withRetry(() => model.generateContent(prompt), {
      label: 'Gemini',
      baseDelayMs: 2000,
    });
    return result.response.text();
  }
}
