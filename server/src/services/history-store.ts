import fsp from 'fs/promises';
import path from 'path';
import { describeError } from '../errors.js';
import { HistoryItemSchema } from '../schemas.js';
import type { HistoryItem } from '../types.js';

/** Durable list of completed generations, newest first. */
export interface HistoryRepository {
  load(): Promise<HistoryItem[]>;
  save(items: readonly HistoryItem[]): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * History kept in one JSON file. Writes go to a temporary sibling first and
 * are renamed into place, so a crash mid-write leaves the previous list intact.
 */
export class JsonHistoryRepository implements HistoryRepository {
  constructor(private readonly filePath: string) {}

  async load(): Promise<HistoryItem[]> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      console.warn(`History file ${this.filePath} is not valid JSON, starting empty: ${describeError(err)}`);
      return [];
    }
    if (!Array.isArray(data)) {
      console.warn(`History file ${this.filePath} does not hold a list, starting empty`);
      return [];
    }

    const items: HistoryItem[] = [];
    for (const entry of data) {
      const parsed = HistoryItemSchema.safeParse(entry);
      if (parsed.success) items.push(parsed.data);
      else console.warn(`Skipping malformed history entry: ${parsed.error.issues[0].message}`);
    }
    return items;
  }

  async save(items: readonly HistoryItem[]): Promise<void> {
    await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fsp.writeFile(tmp, JSON.stringify(items, null, 2), 'utf-8');
    await fsp.rename(tmp, this.filePath);
  }
}
