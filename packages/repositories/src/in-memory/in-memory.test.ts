// Tests for the in-memory implementations

import { describe, it, expect } from 'vitest';
import { createInMemoryRecordSource, createInMemoryExportWriter } from './index.js';
import { DataSourceError } from '../errors.js';

describe('createInMemoryRecordSource', () => {
  it('returns copies of the stored rows', async () => {
    const source = createInMemoryRecordSource([{ Year: 2020, Quarter: 1 }]);

    const rows = await source.fetchAll();
    rows[0].Year = 1999;

    expect(source.rows[0].Year).toBe(2020);
  });

  it('appends rows to the live store', async () => {
    const source = createInMemoryRecordSource();

    await source.append({ Year: 2021, Quarter: 4 });

    expect(source.rows).toEqual([{ Year: 2021, Quarter: 4 }]);
  });

  it('simulates an unreachable source', async () => {
    const source = createInMemoryRecordSource([], { failWith: 'offline' });

    await expect(source.fetchAll()).rejects.toBeInstanceOf(DataSourceError);
    await expect(source.append({})).rejects.toThrow('Data source append failed: offline');
  });
});

describe('createInMemoryExportWriter', () => {
  it('appends and overwrites files', async () => {
    const { writer, files } = createInMemoryExportWriter();

    await writer.appendFile('log.txt', 'a\n');
    await writer.appendFile('log.txt', 'b\n');
    await writer.writeFile('out.csv', 'x');
    await writer.writeFile('out.csv', 'y');

    expect(files.get('log.txt')).toBe('a\nb\n');
    expect(files.get('out.csv')).toBe('y');
  });
});
