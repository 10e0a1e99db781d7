import { z } from 'zod';

// ─── Dialogue service output ───

const SpeakerSchema = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toUpperCase() : v),
  z.enum(['A', 'B']),
);

const RawDialogueLineSchema = z.object({
  speaker: SpeakerSchema,
  text: z.string().default(''),
  emotion: z.string().default('neutral'),
});

export const RawDialogueSchema = z.object({
  scene_description: z.string().default(''),
  lines: z.array(RawDialogueLineSchema).default([]),
});

export type RawDialogue = z.infer<typeof RawDialogueSchema>;

// ─── Persisted history ───

export const HistoryItemSchema = z.object({
  id: z.string().min(1),
  scenario: z.string(),
  speakerAName: z.string(),
  speakerBName: z.string(),
  createdAt: z.string(),
  durationSec: z.number().nonnegative(),
  outputRef: z.string(),
  thumbnailRef: z.string().nullable().default(null),
});

// ─── HTTP request bodies ───

const booleanField = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform(v => v === true || v === 'true');

export const GenerateBodySchema = z.object({
  scenario: z.string().trim().min(1, 'scenario is required'),
  speaker_a_name: z.string().trim().min(1).max(40).default('Alex'),
  speaker_b_name: z.string().trim().min(1).max(40).default('Sam'),
  voice_a: z.string().trim().min(1).optional(),
  voice_b: z.string().trim().min(1).optional(),
  layout: z.enum(['side-by-side', 'conversation']).optional(),
  use_lip_sync: booleanField.default(true),
});
