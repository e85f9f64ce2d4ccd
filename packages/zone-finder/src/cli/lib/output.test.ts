import { describe, it, expect } from 'vitest';

import { formatTable, formatUtcOffset } from './output.js';

describe('formatUtcOffset', () => {
  it('formats whole and partial hours', () => {
    expect(formatUtcOffset(0)).toBe('+00:00');
    expect(formatUtcOffset(-18000)).toBe('-05:00');
    expect(formatUtcOffset(19800)).toBe('+05:30');
    expect(formatUtcOffset(-34200)).toBe('-09:30');
  });
});

describe('formatTable', () => {
  it('pads columns to the widest cell', () => {
    const table = formatTable(
      [
        { zone: 'Europe/London', offset: '+00:00' },
        { zone: 'Asia/Kolkata', offset: '+05:30' },
      ],
      [
        { key: 'zone', header: 'Zone' },
        { key: 'offset', header: 'Offset', align: 'right' },
      ]
    );

    expect(table.split('\n')).toEqual([
      'Zone          | Offset',
      '--------------+-------',
      'Europe/London | +00:00',
      'Asia/Kolkata  | +05:30',
    ]);
  });

  it('reports an empty table', () => {
    expect(formatTable([], [{ key: 'zone', header: 'Zone' }])).toBe('No entries found.');
  });
});
