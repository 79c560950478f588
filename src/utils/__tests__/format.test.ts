import { describe, it, expect } from 'vitest';
import { formatResult } from '../format.js';
import { RingBuffer } from '../ringBuffer.js';

describe('formatResult', () => {
  it('renders an acknowledgement', () => {
    expect(formatResult({ kind: 'ack', command: 'UPDATE', rowsAffected: 2, durationMs: 7 })).toBe(
      'UPDATE: 2 row(s) affected (7ms)'
    );
  });

  it('renders an empty result', () => {
    expect(formatResult({ kind: 'rows', columns: ['name'], rows: [], rowCount: 0, durationMs: 3 })).toBe(
      '(no rows, 3ms)'
    );
  });

  it('aligns columns and writes NULL for missing values', () => {
    const text = formatResult({
      kind: 'rows',
      columns: ['name', 'salary'],
      rows: [
        ['Sarah', 65000],
        ['Al', null],
      ],
      rowCount: 2,
      durationMs: 4,
    });

    expect(text.split('\n')).toEqual([
      'name  | salary',
      '------+-------',
      'Sarah | 65000 ',
      'Al    | NULL  ',
      '(2 row(s), 4ms)',
    ]);
  });

  it('truncates long results', () => {
    const text = formatResult(
      { kind: 'rows', columns: ['n'], rows: [[1], [2], [3]], rowCount: 3, durationMs: 1 },
      2
    );
    expect(text.split('\n')).toEqual(['n', '-', '1', '2', '... 1 more row(s)', '(3 row(s), 1ms)']);
  });
});

describe('RingBuffer', () => {
  it('drops the oldest entries past capacity', () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);

    expect(buffer.toArray()).toEqual([2, 3]);
    expect(buffer.latest(1)).toEqual([3]);
    expect(buffer.latest(0)).toEqual([]);
    expect(buffer.size).toBe(2);
  });

  it('requires a positive capacity', () => {
    expect(() => new RingBuffer(0)).toThrow('RingBuffer capacity must be a positive integer, got 0');
  });
});
