import { describe, it, expect } from 'vitest';
import { selectFileTypeCounts, selectRecordAt, selectRowCount, selectWindow } from '../selectors';
import { generateMockRecords } from '../../mock/generateMockData';

const state = { records: generateMockRecords(5, ['.jpg', '.mp4', '.txt']) };

describe('selectors', () => {
  it('selectRowCount counts records', () => {
    expect(selectRowCount(state)).toBe(5);
    expect(selectRowCount({ records: [] })).toBe(0);
  });

  it('selectRecordAt returns null outside the range', () => {
    expect(selectRecordAt(state, 4)?.filename).toBe('file_0004.mp4');
    expect(selectRecordAt(state, 5)).toBeNull();
    expect(selectRecordAt(state, -1)).toBeNull();
    expect(selectRecordAt(state, Number.NaN)).toBeNull();
  });

  it('selectWindow clamps to the available rows', () => {
    expect(selectWindow(state, 3, 10).map((r) => r.filename)).toEqual(['file_0003.jpg', 'file_0004.mp4']);
    expect(selectWindow(state, -2, 1)).toHaveLength(1);
    expect(selectWindow(state, 4, 2)).toEqual([]);
  });

  it('selectFileTypeCounts tallies each type', () => {
    expect(selectFileTypeCounts(state)).toEqual({ image: 2, video: 2, unknown: 1 });
  });
});
