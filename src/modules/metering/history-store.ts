import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import path from 'node:path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { AppError } from '../../common/errors/app-error.js';
import type { Logger } from '../../common/logger.js';
import { createEmptyState } from './daily-history.js';
import { isDateKey, isLocalInstant } from './time-normalizer.js';
import type { DailyUsageRecord, PersistedState } from './types.js';

/**
 * Durable per-entry state.
 *
 * One JSON document per entry under the data directory. Saves go through a
 * uniquely named temporary file that is fsynced and renamed over the target,
 * so a reader only ever sees the previous or the next complete document.
 */

const STATE_FILE_VERSION = 1;

const dateKey = z.string().refine(isDateKey, { message: 'expected a YYYY-MM-DD date' });
const localInstant = z.string().refine(isLocalInstant, { message: 'expected a local timestamp' });

const dailyRecordSchema = z.object({
  date: dateKey,
  usage: z.number().nonnegative(),
  costCents: z.number().int().nonnegative(),
  startBalanceCents: z.number().int(),
  rechargeTotalCents: z.number().int(),
  startedAt: localInstant,
  rechargeIds: z.array(z.string()),
  clamped: z.boolean(),
  updatedAt: localInstant,
});

const stateSchema = z.object({
  entryId: z.string().min(1),
  phase: z.enum(['uninitialized', 'tracking']),
  lastBalanceCents: z.number().int(),
  lastPollAt: localInstant.nullable(),
  knownRechargeIds: z.record(dateKey),
  dailyHistory: z.record(dailyRecordSchema),
  monthBaselineBalanceCents: z.number().int(),
  monthBaselineAt: localInstant.nullable(),
  monthStartDate: dateKey.nullable(),
  monthRechargeTotalCents: z.number().int(),
  cycleKey: z.string().nullable(),
}).superRefine((state, ctx) => {
  if (state.phase !== 'tracking') {
    return;
  }
  // A tracking entry cannot reconcile without its period baseline
  for (const field of ['lastPollAt', 'monthBaselineAt', 'monthStartDate'] as const) {
    if (state[field] === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: 'required while tracking' });
    }
  }
});

const stateFileSchema = z.object({
  version: z.literal(STATE_FILE_VERSION),
  savedAt: z.string(),
  state: stateSchema,
});

type SerializedState = z.infer<typeof stateSchema>;

export type LoadStatus = 'loaded' | 'missing' | 'corrupt';

export interface LoadResult {
  state: PersistedState;
  status: LoadStatus;
}

export interface HistoryStoreOptions {
  dataDir: string;
  logger: Logger;
}

export function serializeState(state: PersistedState): SerializedState {
  return {
    ...state,
    knownRechargeIds: Object.fromEntries(state.knownRechargeIds),
    dailyHistory: Object.fromEntries(state.dailyHistory),
  };
}

export function deserializeState(data: SerializedState): PersistedState {
  const dailyHistory = new Map<string, DailyUsageRecord>();
  for (const [date, record] of Object.entries(data.dailyHistory)) {
    if (record.date !== date) {
      throw new Error(`record keyed ${date} carries date ${record.date}`);
    }
    dailyHistory.set(date, record);
  }

  return {
    ...data,
    knownRechargeIds: new Map(Object.entries(data.knownRechargeIds)),
    dailyHistory,
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class HistoryStore {
  private readonly dataDir: string;
  private readonly logger: Logger;

  constructor(options: HistoryStoreOptions) {
    this.dataDir = options.dataDir;
    this.logger = options.logger;
  }

  filePath(entryId: string): string {
    // Entry ids come from configuration; keep them to one path segment
    const safeId = entryId.replace(/[^A-Za-z0-9._-]/g, '_');
    return path.join(this.dataDir, `${safeId}.json`);
  }

  /**
   * Load the state for an entry. A missing or unreadable document yields a
   * fresh uninitialized state instead of failing.
   */
  async load(entryId: string): Promise<LoadResult> {
    const file = this.filePath(entryId);

    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return { state: createEmptyState(entryId), status: 'missing' };
      }
      return this.corrupt(entryId, file, error);
    }

    try {
      const parsed = stateFileSchema.parse(JSON.parse(content));
      if (parsed.state.entryId !== entryId) {
        throw new Error(`document belongs to entry ${parsed.state.entryId}`);
      }
      return { state: deserializeState(parsed.state), status: 'loaded' };
    } catch (error) {
      return this.corrupt(entryId, file, error);
    }
  }

  /**
   * Atomically replace the entry's document. Throws on failure; the previous
   * document stays in place.
   */
  async save(state: PersistedState): Promise<void> {
    const file = this.filePath(state.entryId);
    const tmpFile = `${file}.${nanoid(8)}.tmp`;
    const document = JSON.stringify(
      {
        version: STATE_FILE_VERSION,
        savedAt: new Date().toISOString(),
        state: serializeState(state),
      },
      null,
      2
    );

    await mkdir(this.dataDir, { recursive: true });

    try {
      const handle = await open(tmpFile, 'w');
      try {
        await handle.writeFile(document, 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpFile, file);
    } catch (error) {
      await this.discard(tmpFile);
      throw error;
    }

    this.logger.debug({ entryId: state.entryId, file }, 'State saved');
  }

  /**
   * Delete an entry's document. The next load starts from scratch.
   */
  async remove(entryId: string): Promise<boolean> {
    try {
      await unlink(this.filePath(entryId));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  private corrupt(entryId: string, file: string, error: unknown): LoadResult {
    const reason = error instanceof Error ? error.message : String(error);
    const appError = AppError.corruptPersistedState(entryId, reason);
    this.logger.error(
      { err: appError, entryId, file },
      'Persisted state is corrupt; starting from an empty state'
    );
    return { state: createEmptyState(entryId), status: 'corrupt' };
  }

  private async discard(tmpFile: string): Promise<void> {
    try {
      await unlink(tmpFile);
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn({ err: error, tmpFile }, 'Failed to remove temporary state file');
      }
    }
  }
}
