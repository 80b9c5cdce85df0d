import { readFile, readdir, writeFile } from 'fs/promises';
import path from 'path';
import { PartitionStore } from '../../storage/partitionStore';
import { makeItem, makeTempDir, removeTempDir } from '../../__tests__/helpers';
import { buildIndex, manifestFromFileNames, writeLatest } from '../buildIndex';

describe('manifestFromFileNames', () => {
  it('should split partitions from digests and skip everything else', () => {
    const names = [
      '10-18-2026.json',
      '10-19-2026.json',
      '01-01-2027.json',
      'digest-10-19-2026.json',
      'digest-99-99-2026.json',
      'digest.json',
      'index.json',
      'latest.json',
      '02-30-2026.json',
      '10-20-2026.json.tmp',
      'notes.txt'
    ];
    expect(manifestFromFileNames(names)).toEqual({
      dates: ['01-01-2027', '10-19-2026', '10-18-2026'],
      digests: ['10-19-2026']
    });
  });
});

describe('buildIndex', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should write a compact index.json', async () => {
    await writeFile(path.join(dir, '10-18-2026.json'), '{}');
    await writeFile(path.join(dir, '10-19-2026.json'), '{}');
    await writeFile(path.join(dir, 'digest-10-19-2026.json'), '{}');

    await buildIndex(dir);

    await expect(readFile(path.join(dir, 'index.json'), 'utf-8'))
      .resolves.toBe('{"dates":["10-19-2026","10-18-2026"],"digests":["10-19-2026"]}');
  });

  it('should give the same manifest when rebuilt', async () => {
    await writeFile(path.join(dir, '10-19-2026.json'), '{}');
    const first = await buildIndex(dir);
    const second = await buildIndex(dir);
    expect(second).toEqual(first);
  });

  it('should create the output directory when it is missing', async () => {
    const nested = path.join(dir, 'docs', 'news');
    await expect(buildIndex(nested)).resolves.toEqual({ dates: [], digests: [] });
    expect(await readdir(nested)).toEqual(['index.json']);
  });
});

describe('writeLatest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should point at the newest partition with items newest first', async () => {
    const store = new PartitionStore(dir);
    await store.save('10-18-2026', { old: makeItem({ item_id: 'old' }) });
    await store.save('10-19-2026', {
      early: makeItem({ item_id: 'early', published_at: '2026-10-19T01:00:00+00:00' }),
      late: makeItem({ item_id: 'late', published_at: '2026-10-19T09:00:00+00:00' })
    });

    const now = new Date('2026-10-19T10:00:00Z');
    const latest = await writeLatest(dir, now);

    expect(latest?.date).toBe('10-19-2026');
    expect(latest?.items.map(item => item.item_id)).toEqual(['late', 'early']);

    const written = JSON.parse(await readFile(path.join(dir, 'latest.json'), 'utf-8'));
    expect(written.generated_at).toBe('2026-10-19T10:00:00.000Z');
    expect(written.date).toBe('10-19-2026');
    expect(written.items).toHaveLength(2);
  });

  it('should write nothing when there are no partitions', async () => {
    await expect(writeLatest(dir)).resolves.toBeNull();
    expect(await readdir(dir)).toEqual([]);
  });
});
