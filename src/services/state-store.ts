import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { AppliedJobRecord, AppliedJobsState } from '../types/index.js';
import { logger } from '../utils/logger.js';

const recordSchema = z.object({
  status: z.string(),
  title: z.string().nullable().default(null),
  company: z.string().nullable().default(null),
  url: z.string().nullable().default(null),
  updated_at: z.string().default(''),
});

const stateSchema = z.union([
  z.object({ jobs: z.record(recordSchema).default({}) }),
  // Older files kept a plain list of processed ids
  z.array(z.string()).transform((ids) => ({
    jobs: Object.fromEntries(
      ids.map((id): [string, AppliedJobRecord] => [
        id,
        { status: 'unknown', title: null, company: null, url: null, updated_at: '' },
      ])
    ),
  })),
]);

/**
 * Local wall-clock time to the second, no zone suffix: 2026-01-05T07:08:09
 */
export function nowIso(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, inner]) => [key, sortKeys(inner)])
    );
  }
  return value;
}

export function serializeState(state: AppliedJobsState): string {
  return JSON.stringify(sortKeys(state), null, 2);
}

async function readState(filePath: string): Promise<AppliedJobsState> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { jobs: {} };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    logger.warn(
      `State file ${filePath} is not valid JSON, starting empty (${error instanceof Error ? error.message : String(error)})`
    );
    return { jobs: {} };
  }

  const result = stateSchema.safeParse(raw);
  if (!result.success) {
    logger.warn(`State file ${filePath} has an unexpected shape, starting empty`);
    return { jobs: {} };
  }
  return result.data;
}

/**
 * The set of job ids already handled, keyed by id so an id is stored once.
 */
export class AppliedJobsStore {
  private constructor(
    readonly filePath: string,
    private readonly state: AppliedJobsState
  ) {}

  static async load(filePath: string): Promise<AppliedJobsStore> {
    return new AppliedJobsStore(filePath, await readState(filePath));
  }

  get size(): number {
    return Object.keys(this.state.jobs).length;
  }

  has(jobId: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.state.jobs, jobId);
  }

  get(jobId: string): AppliedJobRecord | undefined {
    return this.has(jobId) ? this.state.jobs[jobId] : undefined;
  }

  ids(): string[] {
    return Object.keys(this.state.jobs);
  }

  record(jobId: string, entry: Omit<AppliedJobRecord, 'updated_at'>, at: Date = new Date()): AppliedJobRecord {
    const stored: AppliedJobRecord = { ...entry, updated_at: nowIso(at) };
    this.state.jobs[jobId] = stored;
    return stored;
  }

  countByStatus(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const entry of Object.values(this.state.jobs)) {
      counts[entry.status] = (counts[entry.status] ?? 0) + 1;
    }
    return counts;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, serializeState(this.state), 'utf8');
  }
}
