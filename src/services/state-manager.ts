import * as path from 'path';
import { readFile, rm, writeFile } from 'fs/promises';
import type { VoiceParams } from '../types.js';
import { getLogger } from '../logger.js';

const logger = getLogger('state');

export interface CompletedChapter {
  index: number;
  file: string;
  sampleRate: number;
  sampleCount: number;
}

/** Everything that shapes a chapter's audio; retained chapters are reused only under the same values. */
export interface RenderSettings {
  voice: VoiceParams;
  maxChunkChars: number;
  gapSeconds: number;
  minChapterLength: number;
}

export interface ConversionState {
  source: string;
  settings: RenderSettings;
  completedChapters: CompletedChapter[];
  failedChapters: Array<{ index: number; title: string; error: string }>;
  timestamp: string;
  totalChapters: number;
}

export const STATE_FILE_NAME = '.chaptercast-state.json';

/**
 * Persists which chapters already have retained audio so an interrupted run
 * can pick up where it stopped.
 */
export class StateManager {
  private getStatePath(workDir: string): string {
    return path.join(path.resolve(workDir), STATE_FILE_NAME);
  }

  async save(state: ConversionState, workDir: string): Promise<void> {
    const statePath = this.getStatePath(workDir);
    await writeFile(statePath, JSON.stringify(state, null, 2));
  }

  async load(workDir: string): Promise<ConversionState | null> {
    const statePath = this.getStatePath(workDir);

    let raw: string;
    try {
      raw = await readFile(statePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    try {
      const state: unknown = JSON.parse(raw);

      if (!this.isValidState(state)) {
        logger.warn(`Invalid state file found at ${statePath}, ignoring`);
        return null;
      }

      return state;
    } catch (error) {
      logger.warn(`Failed to parse state file ${statePath}, ignoring`, { error: String(error) });
      return null;
    }
  }

  /** True when the state was recorded for the same source, chapter list and render settings. */
  matches(state: ConversionState, expected: Pick<ConversionState, 'source' | 'totalChapters' | 'settings'>): boolean {
    return (
      state.source === expected.source &&
      state.totalChapters === expected.totalChapters &&
      canonicalJson(state.settings) === canonicalJson(expected.settings)
    );
  }

  findCompleted(chapterIndex: number, state: ConversionState | null): CompletedChapter | undefined {
    return state?.completedChapters.find(c => c.index === chapterIndex);
  }

  markCompleted(state: ConversionState, chapter: CompletedChapter): void {
    state.completedChapters = [
      ...state.completedChapters.filter(c => c.index !== chapter.index),
      chapter
    ].sort((a, b) => a.index - b.index);
    // Remove from failedChapters if it was previously failed (retry success)
    state.failedChapters = state.failedChapters.filter(f => f.index !== chapter.index);
    state.timestamp = new Date().toISOString();
  }

  markFailed(state: ConversionState, failure: { index: number; title: string; error: string }): void {
    state.failedChapters = [...state.failedChapters.filter(f => f.index !== failure.index), failure];
    state.timestamp = new Date().toISOString();
  }

  async clear(workDir: string): Promise<void> {
    await rm(this.getStatePath(workDir), { force: true });
  }

  private isValidState(state: unknown): state is ConversionState {
    if (typeof state !== 'object' || state === null) return false;

    const s = state as Record<string, unknown>;

    // Validate basic structure
    if (
      typeof s.source !== 'string' ||
      typeof s.settings !== 'object' ||
      s.settings === null ||
      !Array.isArray(s.completedChapters) ||
      !Array.isArray(s.failedChapters) ||
      typeof s.timestamp !== 'string' ||
      typeof s.totalChapters !== 'number'
    ) {
      return false;
    }

    const totalChapters = Number(s.totalChapters);
    const isIndex = (index: unknown): boolean =>
      typeof index === 'number' && Number.isInteger(index) && index >= 0 && index < totalChapters;

    const completedValid = (s.completedChapters as unknown[]).every((c: unknown) => {
      if (typeof c !== 'object' || c === null) return false;
      const item = c as Record<string, unknown>;
      return (
        isIndex(item.index) &&
        typeof item.file === 'string' &&
        typeof item.sampleRate === 'number' &&
        typeof item.sampleCount === 'number'
      );
    });

    if (!completedValid) return false;

    // Validate failedChapters array structure
    return (s.failedChapters as unknown[]).every((f: unknown) => {
      if (typeof f !== 'object' || f === null) return false;
      const item = f as Record<string, unknown>;
      return isIndex(item.index) && typeof item.title === 'string' && typeof item.error === 'string';
    });
  }
}

// Key order and undefined fields do not count as differences
function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, inner: unknown) =>
    inner !== null && typeof inner === 'object' && !Array.isArray(inner)
      ? Object.fromEntries(Object.entries(inner).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
      : inner
  );
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
