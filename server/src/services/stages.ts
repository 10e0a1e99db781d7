export interface StageDefinition {
  index: number;
  name: string;
  description: string;
  /** Progress reported when the stage starts. */
  percent: number;
}

export const PIPELINE_STAGES: readonly StageDefinition[] = [
  { index: 1, name: 'Validating Inputs', description: 'Checking portrait images and API keys', percent: 0 },
  { index: 2, name: 'Generating Dialogue', description: 'Creating natural conversation with AI', percent: 14 },
  { index: 3, name: 'Synthesizing Speech', description: 'Converting text to realistic voice audio', percent: 28 },
  { index: 4, name: 'Creating Background', description: 'Generating scene with AI', percent: 42 },
  { index: 5, name: 'Animating Portraits', description: 'Adding lip sync to portraits', percent: 56 },
  { index: 6, name: 'Assembling Video', description: 'Combining all elements', percent: 70 },
  { index: 7, name: 'Finalizing', description: 'Encoding final video', percent: 85 },
];

export const TOTAL_STAGES = PIPELINE_STAGES.length;

export const STAGE = {
  validate: PIPELINE_STAGES[0],
  dialogue: PIPELINE_STAGES[1],
  speech: PIPELINE_STAGES[2],
  background: PIPELINE_STAGES[3],
  animate: PIPELINE_STAGES[4],
  assemble: PIPELINE_STAGES[5],
  finalize: PIPELINE_STAGES[6],
} as const;

export const QUEUED_STAGE_NAME = 'Queued';
export const STARTING_STAGE_NAME = 'Starting';
export const COMPLETE_STAGE_NAME = 'Complete';
export const FAILED_STAGE_NAME = 'Failed';
