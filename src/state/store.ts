/**
 * Hazard Relay: Sent-State Store
 *
 * Persists the ids already announced as a small JSON file. Two shapes are
 * read (a bare array, or `{ "sent_ids": [...] }`); only the object form is
 * written. The "cleared" sentinel is stored as a reserved id.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { EMPTY_SENT_STATE, type SentState } from '../types';
import { StateCorruption } from '../lib/errors';
import { errorMessage, logger } from '../lib/logger';

export const CLEARED_SENTINEL = '__no_current_warnings__';

const StateRecordSchema = z.union([
  z.array(z.string()),
  z.object({
    sent_ids: z.array(z.string()),
    category: z.string().min(1).nullable().optional(),
  }),
]);

export interface PersistedState {
  sent_ids: string[];
  category?: string;
}

export interface StateStore {
  load(): Promise<SentState>;
  save(state: SentState): Promise<void>;
}

/**
 * Decode a persisted record. Throws StateCorruption when the text is not one
 * of the accepted shapes.
 */
export function decodeState(text: string, path: string): SentState {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StateCorruption(`State file is not valid JSON: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  const parsed = StateRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateCorruption(
      `State file has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      path
    );
  }

  const record = parsed.data;
  const ids = Array.isArray(record) ? record : record.sent_ids;
  const category = Array.isArray(record) ? null : (record.category ?? null);

  return {
    ids: new Set(ids.filter(id => id !== '' && id !== CLEARED_SENTINEL)),
    clearedAnnounced: ids.includes(CLEARED_SENTINEL),
    category,
  };
}

export function encodeState(state: SentState): string {
  const ids = [...state.ids].sort();
  if (state.clearedAnnounced) ids.push(CLEARED_SENTINEL);

  const record: PersistedState = { sent_ids: ids };
  if (state.category !== null) record.category = state.category;

  return `${JSON.stringify(record, null, 2)}\n`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private readonly logger = logger.child({ component: 'state-store' });

  constructor(readonly path: string) {}

  async load(): Promise<SentState> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info('No state file yet, starting empty', { path: this.path });
        return EMPTY_SENT_STATE;
      }
      this.logger.warn('State file unreadable, starting empty', {
        path: this.path,
        error: errorMessage(error),
      });
      return EMPTY_SENT_STATE;
    }

    try {
      const state = decodeState(text, this.path);
      this.logger.debug('State loaded', {
        path: this.path,
        ids: state.ids.size,
        clearedAnnounced: state.clearedAnnounced,
      });
      return state;
    } catch (error) {
      this.logger.warn('State file corrupt, starting empty', {
        path: this.path,
        error: errorMessage(error),
      });
      return EMPTY_SENT_STATE;
    }
  }

  /**
   * Write to a sibling temp file, then rename over the target.
   */
  async save(state: SentState): Promise<void> {
    const tmpPath = join(dirname(this.path), `.${basename(this.path)}.${nanoid(8)}.tmp`);

    try {
      await writeFile(tmpPath, encodeState(state), 'utf8');
      await rename(tmpPath, this.path);
    } catch (error) {
      await rm(tmpPath, { force: true });
      throw error;
    }

    this.logger.info('State saved', {
      path: this.path,
      ids: state.ids.size,
      clearedAnnounced: state.clearedAnnounced,
    });
  }
}
