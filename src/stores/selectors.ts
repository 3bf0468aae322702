/**
 * Plain selectors over gallery state.
 *
 * They take any object carrying the snapshot fields, so they work on
 * `gallery.getState()`, on a snapshot captured earlier, or inside a
 * `gallery.subscribe()` callback, and a renderer can use them as-is with its
 * own binding (e.g. zustand's useStore).
 */
import type { FileType, MediaRecord } from '../types';

interface RecordsState {
  records: readonly MediaRecord[];
}

/** Total row count. */
export function selectRowCount(state: RecordsState): number {
  return state.records.length;
}

/** Record at a row, or null outside [0, rowCount). */
export function selectRecordAt(state: RecordsState, index: number): MediaRecord | null {
  if (!Number.isInteger(index) || index < 0 || index >= state.records.length) {
    return null;
  }
  return state.records[index] ?? null;
}

/** Records for a contiguous window of rows, clamped to the available range. */
export function selectWindow(state: RecordsState, start: number, end: number): readonly MediaRecord[] {
  const from = Math.max(0, Math.floor(start));
  const to = Math.min(state.records.length, Math.floor(end));
  if (to <= from) return [];
  return state.records.slice(from, to);
}

/** Row count per file type, for a status line. */
export function selectFileTypeCounts(state: RecordsState): Record<FileType, number> {
  const counts: Record<FileType, number> = { image: 0, video: 0, unknown: 0 };
  for (const record of state.records) {
    counts[record.fileType] += 1;
  }
  return counts;
}
