import path from 'path';
import { PipelineError } from '../errors.js';
import type { GenerationRequest, GenerationStatus } from '../types.js';
import type { JobTracker } from './job-tracker.js';
import type { ConversationPipeline } from './pipeline.js';
import { totalDuration } from './script.js';

export interface GenerationDeps {
  tracker: JobTracker;
  pipeline: ConversationPipeline;
  outputsDir: string;
}

export function outputPaths(outputsDir: string, jobId: string): { video: string; thumbnail: string } {
  return {
    video: path.join(outputsDir, `${jobId}.mp4`),
    thumbnail: path.join(outputsDir, `${jobId}_thumb.jpg`),
  };
}

/**
 * Submit a pipeline run to the tracker. Stage progress is forwarded as it
 * happens; the run's failure result becomes the job's error.
 */
export function startGenerationJob(
  deps: GenerationDeps,
  request: GenerationRequest,
  jobId?: string,
): GenerationStatus {
  const summary = {
    scenario: request.scenario,
    speakerAName: request.speakerAName ?? 'Alex',
    speakerBName: request.speakerBName ?? 'Sam',
  };

  return deps.tracker.submit(
    summary,
    async job => {
      const paths = outputPaths(deps.outputsDir, job.id);
      const result = await deps.pipeline.generate(request, {
        jobId: job.id,
        outputPath: paths.video,
        thumbnailPath: paths.thumbnail,
        onStage: stage => job.advance(stage.index, stage.name, stage.percent),
      });
      if (!result.success) throw new PipelineError(result.error);

      return {
        outputPath: result.outputPath,
        thumbnailPath: result.thumbnailPath,
        durationSec: totalDuration(result.script),
      };
    },
    jobId,
  );
}
