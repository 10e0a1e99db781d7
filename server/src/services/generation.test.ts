import fs from 'fs';
import path from 'path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  FakeDialogue,
  InMemoryHistoryRepository,
  fakeServices,
  makeTempDir,
  testConfig,
  writePortraits,
} from '../test/fakes.js';
import type { AppConfig } from '../config.js';
import type { GenerationRequest, GenerationStatus } from '../types.js';
import { startGenerationJob } from './generation.js';
import { JobTracker } from './job-tracker.js';
import { ConversationPipeline } from './pipeline.js';

describe('startGenerationJob', () => {
  let config: AppConfig;
  let request: GenerationRequest;
  let tracker: JobTracker;

  beforeEach(async () => {
    const root = await makeTempDir();
    config = testConfig(root);
    request = { ...(await writePortraits(root)), scenario: 'A job interview that goes sideways' };
    tracker = new JobTracker({ repository: new InMemoryHistoryRepository(), outputsDir: config.paths.outputsDir });
    await tracker.init();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  function deps(services = fakeServices()) {
    return {
      tracker,
      pipeline: new ConversationPipeline(config, services),
      outputsDir: config.paths.outputsDir,
    };
  }

  it('runs the pipeline and records the result in history', async () => {
    const status = startGenerationJob(deps(), request, 'job-1');
    expect(status.state).toBe('processing');

    await tracker.settled('job-1');

    expect(tracker.getStatus('job-1')).toMatchObject({
      state: 'completed',
      progressPercent: 100,
      outputRef: '/outputs/job-1.mp4',
    });
    expect(fs.existsSync(path.join(config.paths.outputsDir, 'job-1.mp4'))).toBe(true);

    const [item] = tracker.history();
    expect(item).toMatchObject({
      id: 'job-1',
      scenario: 'A job interview that goes sideways',
      speakerAName: 'Alex',
      speakerBName: 'Sam',
      outputRef: '/outputs/job-1.mp4',
      thumbnailRef: '/outputs/job-1_thumb.jpg',
    });
    // 3 s + 0.3 + 1 s + 0.3 + 2 s
    expect(item.durationSec).toBeCloseTo(6.6);
  });

  it('forwards stage progress to subscribers', async () => {
    const seen: GenerationStatus[] = [];
    startGenerationJob(deps(), request, 'job-1');
    tracker.subscribe('job-1', status => {
      seen.push(status);
    });
    await tracker.settled('job-1');

    const names = seen.map(s => s.stageName);
    expect(names.slice(-7)).toEqual([
      'Generating Dialogue',
      'Synthesizing Speech',
      'Creating Background',
      'Animating Portraits',
      'Assembling Video',
      'Finalizing',
      'Complete',
    ]);
    const percents = seen.map(s => s.progressPercent);
    expect(percents).toEqual([...percents].sort((a, b) => a - b));
  });

  it('fails the job with the pipeline error', async () => {
    const services = fakeServices({ dialogue: new FakeDialogue('no json here') });
    startGenerationJob(deps(services), request, 'job-1');
    await tracker.settled('job-1');

    expect(tracker.getStatus('job-1')).toMatchObject({
      state: 'failed',
      stageName: 'Failed',
      stageIndex: 2,
      error: 'Could not find JSON in dialogue response: no json here',
      outputRef: null,
    });
    expect(tracker.history()).toEqual([]);
  });

  it('keeps two concurrent jobs apart', async () => {
    const seen: Record<string, string[]> = { 'job-1': [], 'job-2': [] };
    startGenerationJob(deps(), request, 'job-1');
    startGenerationJob(deps(), { ...request, speakerAName: 'Rosa' }, 'job-2');
    for (const id of ['job-1', 'job-2']) {
      tracker.subscribe(id, status => {
        seen[id].push(status.id);
      });
    }
    await Promise.all([tracker.settled('job-1'), tracker.settled('job-2')]);

    expect(new Set(seen['job-1'])).toEqual(new Set(['job-1']));
    expect(new Set(seen['job-2'])).toEqual(new Set(['job-2']));
    expect(tracker.history().map(h => h.id).sort()).toEqual(['job-1', 'job-2']);
    expect(tracker.history().find(h => h.id === 'job-2')?.speakerAName).toBe('Rosa');
  });
});
