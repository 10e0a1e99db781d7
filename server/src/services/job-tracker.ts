import fsp from 'fs/promises';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { describeError } from '../errors.js';
import type { GenerationStatus, HistoryItem, JobCompletion, JobSummary } from '../types.js';
import type { HistoryRepository } from './history-store.js';
import {
  COMPLETE_STAGE_NAME,
  FAILED_STAGE_NAME,
  QUEUED_STAGE_NAME,
  STARTING_STAGE_NAME,
  TOTAL_STAGES,
} from './stages.js';

/** Receives a snapshot of the job status after every change. */
export type JobSubscriber = (status: GenerationStatus) => void | Promise<void>;

export interface JobHandle {
  readonly id: string;
  advance(stageIndex: number, stageName: string, progressPercent: number): void;
}

/** The work behind a job. Rejecting marks the job failed with the error's message. */
export type JobTask = (job: JobHandle) => Promise<JobCompletion>;

export interface JobTrackerOptions {
  repository: HistoryRepository;
  /** Directory the public output refs resolve into. */
  outputsDir: string;
  /** URL prefix for output refs. Defaults to "/outputs". */
  publicPrefix?: string;
  /** 0 means unlimited. */
  maxConcurrentJobs?: number;
}

interface JobEntry {
  status: GenerationStatus;
  summary: JobSummary;
  task: JobTask;
  subscribers: Set<JobSubscriber>;
  settled: Promise<void>;
  markSettled: () => void;
}

function isTerminal(status: GenerationStatus): boolean {
  return status.state === 'completed' || status.state === 'failed';
}

function clampPercent(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * Owns every job's live status and the persisted history. Jobs beyond the
 * concurrency limit wait as `pending` and start in submission order.
 * History writes are serialized through one queue.
 */
export class JobTracker {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly queue: string[] = [];
  private running = 0;
  private items: HistoryItem[] = [];
  private writes: Promise<void> = Promise.resolve();
  private readonly repository: HistoryRepository;
  private readonly outputsDir: string;
  private readonly publicPrefix: string;
  private readonly maxConcurrentJobs: number;

  constructor(options: JobTrackerOptions) {
    this.repository = options.repository;
    this.outputsDir = options.outputsDir;
    this.publicPrefix = (options.publicPrefix ?? '/outputs').replace(/\/+$/, '');
    this.maxConcurrentJobs = options.maxConcurrentJobs ?? 0;
  }

  async init(): Promise<void> {
    this.items = await this.repository.load();
    console.log(`Loaded ${this.items.length} history item(s)`);
  }

  submit(summary: JobSummary, task: JobTask, id: string = uuid()): GenerationStatus {
    if (this.jobs.has(id)) throw new Error(`Job ${id} already exists`);

    let markSettled: () => void = () => undefined;
    const settled = new Promise<void>(resolve => {
      markSettled = resolve;
    });
    const entry: JobEntry = {
      status: {
        id,
        state: 'pending',
        stageIndex: 0,
        totalStages: TOTAL_STAGES,
        stageName: QUEUED_STAGE_NAME,
        progressPercent: 0,
        createdAt: new Date().toISOString(),
        completedAt: null,
        outputRef: null,
        error: null,
      },
      summary,
      task,
      subscribers: new Set(),
      settled,
      markSettled,
    };
    this.jobs.set(id, entry);

    if (this.hasFreeSlot()) {
      this.start(entry);
    } else {
      this.queue.push(id);
      console.log(`Job ${id} queued (${this.running} running)`);
    }
    return { ...entry.status };
  }

  getStatus(jobId: string): GenerationStatus | null {
    const entry = this.jobs.get(jobId);
    return entry ? { ...entry.status } : null;
  }

  /** Record stage progress. Ignored once the job has ended; percent never goes backwards. */
  advance(jobId: string, stageIndex: number, stageName: string, progressPercent: number): void {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.status.state !== 'processing') return;

    entry.status.stageIndex = stageIndex;
    entry.status.stageName = stageName;
    entry.status.progressPercent = Math.max(entry.status.progressPercent, clampPercent(progressPercent));
    this.broadcast(jobId, entry);
  }

  async complete(jobId: string, completion: JobCompletion): Promise<void> {
    const entry = this.jobs.get(jobId);
    if (!entry || isTerminal(entry.status)) return;

    const completedAt = new Date().toISOString();
    const outputRef = this.toRef(completion.outputPath);
    Object.assign(entry.status, {
      state: 'completed',
      stageIndex: TOTAL_STAGES,
      stageName: COMPLETE_STAGE_NAME,
      progressPercent: 100,
      completedAt,
      outputRef,
      error: null,
    } satisfies Partial<GenerationStatus>);
    this.broadcast(jobId, entry);

    const item: HistoryItem = {
      id: jobId,
      ...entry.summary,
      createdAt: entry.status.createdAt,
      durationSec: completion.durationSec,
      outputRef,
      thumbnailRef: completion.thumbnailPath ? this.toRef(completion.thumbnailPath) : null,
    };
    await this.mutateHistory(items => ({ items: [item, ...items.filter(i => i.id !== jobId)], result: undefined }));
  }

  fail(jobId: string, error: string): void {
    const entry = this.jobs.get(jobId);
    if (!entry || isTerminal(entry.status)) return;

    entry.status.state = 'failed';
    entry.status.stageName = FAILED_STAGE_NAME;
    entry.status.completedAt = new Date().toISOString();
    entry.status.error = error;
    this.broadcast(jobId, entry);
  }

  /**
   * Register for status updates; the current status is delivered immediately.
   * Returns the function that unregisters, or null for an unknown job.
   */
  subscribe(jobId: string, subscriber: JobSubscriber): (() => void) | null {
    const entry = this.jobs.get(jobId);
    if (!entry) return null;
    entry.subscribers.add(subscriber);
    this.deliver(jobId, entry.subscribers, subscriber, { ...entry.status });
    return () => this.unsubscribe(jobId, subscriber);
  }

  unsubscribe(jobId: string, subscriber: JobSubscriber): void {
    this.jobs.get(jobId)?.subscribers.delete(subscriber);
  }

  /** Resolves once the job has completed or failed. */
  settled(jobId: string): Promise<void> {
    return this.jobs.get(jobId)?.settled ?? Promise.resolve();
  }

  history(): HistoryItem[] {
    return this.items.map(item => ({ ...item }));
  }

  /**
   * Drop a job from history and delete its published artifacts.
   * Returns whether a history entry was removed.
   */
  async forget(jobId: string): Promise<boolean> {
    const removed = await this.mutateHistory(items => {
      const found = items.find(i => i.id === jobId);
      return { items: found ? items.filter(i => i.id !== jobId) : items, result: found };
    });

    if (removed) {
      for (const ref of [removed.outputRef, removed.thumbnailRef]) {
        if (ref) await fsp.rm(this.fromRef(ref), { force: true });
      }
    }
    const entry = this.jobs.get(jobId);
    if (entry && isTerminal(entry.status)) this.jobs.delete(jobId);

    return removed !== undefined;
  }

  /** Detach every subscriber and wait for pending history writes. */
  async shutdown(): Promise<void> {
    for (const entry of this.jobs.values()) entry.subscribers.clear();
    await this.writes;
  }

  // ─── internals ───

  private hasFreeSlot(): boolean {
    return this.maxConcurrentJobs <= 0 || this.running < this.maxConcurrentJobs;
  }

  private start(entry: JobEntry): void {
    const id = entry.status.id;
    this.running++;
    entry.status.state = 'processing';
    entry.status.stageName = STARTING_STAGE_NAME;
    this.broadcast(id, entry);

    this.supervise(entry).catch(err => console.error(`Supervisor for job ${id} crashed: ${describeError(err)}`));
  }

  private async supervise(entry: JobEntry): Promise<void> {
    const id = entry.status.id;
    const handle: JobHandle = {
      id,
      advance: (stageIndex, stageName, percent) => this.advance(id, stageIndex, stageName, percent),
    };

    try {
      const completion = await entry.task(handle);
      await this.complete(id, completion);
    } catch (err) {
      if (isTerminal(entry.status)) {
        console.error(`Job ${id} errored after reaching "${entry.status.state}": ${describeError(err)}`);
      } else {
        this.fail(id, describeError(err));
      }
    } finally {
      this.running--;
      entry.markSettled();
      this.startQueued();
    }
  }

  private startQueued(): void {
    while (this.queue.length > 0 && this.hasFreeSlot()) {
      const next = this.queue.shift();
      const entry = next === undefined ? undefined : this.jobs.get(next);
      if (entry) this.start(entry);
    }
  }

  /** Snapshot first, then notify; a subscriber that throws is dropped. */
  private broadcast(jobId: string, entry: JobEntry): void {
    const snapshot = { ...entry.status };
    for (const subscriber of [...entry.subscribers]) {
      this.deliver(jobId, entry.subscribers, subscriber, { ...snapshot });
    }
  }

  private deliver(
    jobId: string,
    subscribers: Set<JobSubscriber>,
    subscriber: JobSubscriber,
    snapshot: GenerationStatus,
  ): void {
    const drop = (err: unknown) => {
      subscribers.delete(subscriber);
      console.warn(`Dropped a subscriber of job ${jobId}: ${describeError(err)}`);
    };
    try {
      const result = subscriber(snapshot);
      if (result instanceof Promise) result.catch(drop);
    } catch (err) {
      drop(err);
    }
  }

  private mutateHistory<T>(mutate: (items: HistoryItem[]) => { items: HistoryItem[]; result: T }): Promise<T> {
    const next = this.writes.then(async () => {
      const { items, result } = mutate(this.items);
      if (items !== this.items) {
        await this.repository.save(items);
        this.items = items;
      }
      return result;
    });
    this.writes = next.then(
      () => undefined,
      err => console.error(`Failed to persist history: ${describeError(err)}`),
    );
    return next;
  }

  private toRef(filePath: string): string {
    return `${this.publicPrefix}/${path.basename(filePath)}`;
  }

  private fromRef(ref: string): string {
    return path.join(this.outputsDir, path.basename(ref));
  }
}
