import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { compileAll, compileIndex, tableByteSize } from '../compile.js';
import { DuplicatePointerError } from '../errors.js';
import { type LogEntry, onLog } from '../logger.js';
import { compileRange } from '../range.js';
import type { EncodingSpec } from '../registry.js';
import type { IndexData } from '../types.js';

const SINGLE: EncodingSpec = { kind: 'single-byte', name: 'cp-test', group: 'singlebyte' };
const MULTI: EncodingSpec = { kind: 'multi-byte', name: 'dbcs-test', group: 'testgroup' };
const RANGE: EncodingSpec = { kind: 'range', name: 'ranges-test', group: 'testgroup' };

function data(pairs: Array<[number, number]>, comments: string[] = []): IndexData {
  return { entries: pairs.map(([pointer, scalar]) => ({ pointer, scalar })), comments };
}

describe('compileIndex', () => {
  it('routes single-byte encodings and sizes their tables', () => {
    const index = compileIndex(SINGLE, data([[0, 0x41]], [' test']));
    expect(index.name).toBe('cp-test');
    expect(index.group).toBe('singlebyte');
    expect(index.kind).toBe('single-byte');
    expect(index.comments).toEqual([' test']);
    // 128 × 2 forward + 16 × 1 lower + 9 × 2 upper
    expect(index.byteSize).toBe(290);
  });

  it('routes multi-byte encodings and sizes their tables', () => {
    const index = compileIndex(
      MULTI,
      data([
        [0, 0x41],
        [1, 0x42],
        [2, 0x41],
      ]),
    );
    expect(index.tables.kind).toBe('multi-byte');
    // 3 × 2 forward + 16 × 2 lower + 9 × 2 upper
    expect(index.byteSize).toBe(56);
  });

  it('passes multi-byte policy through', () => {
    const spec: EncodingSpec = { kind: 'multi-byte', name: 'dbcs-test', group: 'testgroup', aliases: [10] };
    const index = compileIndex(spec, data([[0, 0x41]]));
    expect(index.tables.kind === 'multi-byte' ? index.tables.duplicates : []).toEqual([10]);
  });

  it('routes range encodings and sizes their tables', () => {
    const index = compileIndex(
      RANGE,
      data([
        [0, 0],
        [10, 100],
        [20, 300],
      ]),
    );
    expect(index.byteSize).toBe(24);
  });

  it('counts the prepended floor in the range size', () => {
    const index = compileIndex(
      RANGE,
      data([
        [5, 50],
        [10, 70],
        [20, 300],
      ]),
    );
    expect(index.byteSize).toBe(32);
  });

  it('copies commentary', () => {
    const comments = [' a'];
    const index = compileIndex(SINGLE, data([], comments));
    comments.push(' b');
    expect(index.comments).toEqual([' a']);
  });
});

describe('tableByteSize', () => {
  it('sums keys and values of range tables', () => {
    const tables = compileRange([{ pointer: 0, scalar: 0 }]);
    expect(tableByteSize(tables)).toBe(8);
  });
});

describe('compileAll', () => {
  const entries: LogEntry[] = [];
  let unsubscribe: () => void = () => {};

  beforeEach(() => {
    unsubscribe = onLog((entry) => {
      entries.push(entry);
    });
  });

  afterEach(() => {
    unsubscribe();
    entries.length = 0;
  });

  it('isolates failing encodings', () => {
    const broken: EncodingSpec = { kind: 'single-byte', name: 'broken', group: 'singlebyte' };
    const outcomes = compileAll([SINGLE, broken, MULTI], (spec) => {
      if (spec.name === 'broken') throw new Error('boom');
      return data([[0, 0x41]]);
    });

    expect(outcomes.map((o) => [o.name, o.ok])).toEqual([
      ['cp-test', true],
      ['broken', false],
      ['dbcs-test', true],
    ]);
    const failure = outcomes[1];
    expect(failure.ok ? undefined : failure.error.message).toBe('boom');
    expect(entries.filter((e) => e.level === 'error').map((e) => e.message)).toEqual([
      'failed to compile broken: boom',
    ]);
  });

  it('captures integrity errors', () => {
    const [outcome] = compileAll([SINGLE], () =>
      data([
        [1, 0x41],
        [1, 0x42],
      ]),
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(DuplicatePointerError);
    }
  });

  it('wraps non-Error throws', () => {
    const [outcome] = compileAll([SINGLE], () => {
      throw 'missing file';
    });
    expect(outcome.ok ? undefined : outcome.error.message).toBe('missing file');
  });
});
