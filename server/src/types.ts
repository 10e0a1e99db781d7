// ─── Script Model ───

export type Speaker = 'A' | 'B';

export type VideoLayout = 'side-by-side' | 'conversation';

export type VideoResolution = '480p' | '720p' | '1080p';

export interface DialogueLine {
  speaker: Speaker;
  name: string;            // display name of the speaker
  text: string;
  start: number;           // seconds from the start of the conversation
  duration: number;        // seconds, > 0
  emotion: string;         // friendly, curious, excited, thoughtful, amused, serious, surprised, warm, neutral
}

export interface ConversationScript {
  readonly lines: readonly DialogueLine[];
  speakerAName: string;
  speakerBName: string;
  sceneDescription: string;
}

// ─── Audio ───

export interface AudioSegment {
  filePath: string;
  durationSec: number;     // measured from the decoded file
  speaker: Speaker;
  text: string;
  lineIndex: number;
}

export interface AudioPlacement {
  filePath: string;
  delayMs: number;
}

// ─── Pipeline ───

export interface GenerationRequest {
  portraitA: string;
  portraitB: string;
  scenario: string;
  /** Defaults to "Alex". */
  speakerAName?: string;
  /** Defaults to "Sam". */
  speakerBName?: string;
  /** Voice preset name or raw voice id; defaults to the configured voice for A. */
  voiceA?: string;
  voiceB?: string;
  /** Caller-supplied background image. When absent or missing, one is generated. */
  backgroundPath?: string;
  layout?: VideoLayout;
  /** Set to false to skip lip sync and render static portraits. Defaults to true. */
  useLipSync?: boolean;
  targetDurationSec?: number;
}

export interface StageUpdate {
  index: number;
  name: string;
  percent: number;
}

export type IntermediateFiles = Record<string, string[]>;

export type PipelineResult =
  | {
    success: true;
    outputPath: string;
    thumbnailPath: string;
    script: ConversationScript;
    error: null;
    intermediateFiles: IntermediateFiles;
  }
  | {
    success: false;
    outputPath: null;
    thumbnailPath: null;
    script: null;
    error: string;
    intermediateFiles: IntermediateFiles;
  };

// ─── Jobs ───

export type JobState = 'pending' | 'processing' | 'completed' | 'failed';

export interface GenerationStatus {
  id: string;
  state: JobState;
  stageIndex: number;
  totalStages: number;
  stageName: string;
  progressPercent: number;
  createdAt: string;
  completedAt: string | null;
  outputRef: string | null;
  error: string | null;
}

export interface JobSummary {
  scenario: string;
  speakerAName: string;
  speakerBName: string;
}

export interface JobCompletion {
  outputPath: string;
  thumbnailPath: string | null;
  durationSec: number;
}

export interface HistoryItem {
  id: string;
  scenario: string;
  speakerAName: string;
  speakerBName: string;
  createdAt: string;
  durationSec: number;
  outputRef: string;
  thumbnailRef: string | null;
}
