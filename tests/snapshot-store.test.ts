import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { deserializeSnapshot, serializeSnapshot, SnapshotStore } from '../src/snapshot-store.js';
import type { Snapshot } from '../src/types.js';

// Record the order of disk operations performed by save()
const { diskOps } = vi.hoisted(() => {
  const diskOps: string[] = [];
  return { diskOps };
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      const sync = handle.sync.bind(handle);
      handle.sync = async () => {
        diskOps.push('sync');
        return sync();
      };
      diskOps.push('open');
      return handle;
    },
    rename: async (...args: Parameters<typeof actual.rename>) => {
      diskOps.push('rename');
      return actual.rename(...args);
    },
  };
});

const URL_A = 'https://github.com/acme/widgets/pull/1';
const URL_B = 'https://github.com/acme/gears/pull/7';

function sampleSnapshot(): Snapshot {
  return {
    seen: new Set([URL_A, URL_B]),
    commentCount: new Map([[URL_A, 3], [URL_B, 0]]),
    reviewState: new Map([[URL_A, 'APPROVED'], [URL_B, '']]),
    ciState: new Map([[URL_A, 'passing'], [URL_B, 'failing']]),
  };
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'pr-watch-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('serializeSnapshot', () => {
  it('writes the four mappings in the file format', () => {
    expect(serializeSnapshot(sampleSnapshot())).toEqual({
      version: 1,
      seenUrls: [URL_A, URL_B],
      commentCounts: { [URL_A]: 3, [URL_B]: 0 },
      reviewStates: { [URL_A]: 'APPROVED', [URL_B]: '' },
      ciStates: { [URL_A]: 'passing', [URL_B]: 'failing' },
    });
  });

  it('reads back what it wrote', () => {
    expect(deserializeSnapshot(serializeSnapshot(sampleSnapshot()))).toEqual(sampleSnapshot());
  });
});

describe('SnapshotStore', () => {
  it('returns null from restore and an empty snapshot from load when no file exists', async () => {
    const store = new SnapshotStore(path.join(dir, 'state.json'));
    expect(await store.restore()).toBeNull();

    const loaded = await store.load();
    expect(loaded.seen.size).toBe(0);
    expect(loaded.commentCount.size).toBe(0);
    expect(loaded.reviewState.size).toBe(0);
    expect(loaded.ciState.size).toBe(0);
  });

  it('saves and loads the same snapshot', async () => {
    const store = new SnapshotStore(path.join(dir, 'state.json'));
    await store.save(sampleSnapshot());
    expect(await store.load()).toEqual(sampleSnapshot());
  });

  it('creates missing parent directories', async () => {
    const file = path.join(dir, 'nested', 'deeper', 'state.json');
    const store = new SnapshotStore(file);
    await store.save(sampleSnapshot());
    expect(JSON.parse(await readFile(file, 'utf-8')).version).toBe(1);
  });

  it('leaves no temp file behind after saving', async () => {
    const store = new SnapshotStore(path.join(dir, 'state.json'));
    await store.save(sampleSnapshot());
    expect(await readdir(dir)).toEqual(['state.json']);
  });

  it('replaces the previous file', async () => {
    const file = path.join(dir, 'state.json');
    const store = new SnapshotStore(file);
    await store.save(sampleSnapshot());

    const smaller: Snapshot = {
      seen: new Set([URL_A]),
      commentCount: new Map([[URL_A, 4]]),
      reviewState: new Map([[URL_A, 'APPROVED']]),
      ciState: new Map([[URL_A, 'pending']]),
    };
    await store.save(smaller);
    expect(await store.load()).toEqual(smaller);
  });

  it('treats invalid JSON as no snapshot and warns', async () => {
    const file = path.join(dir, 'state.json');
    await writeFile(file, '{"seenUrls": [', 'utf-8');
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const store = new SnapshotStore(file, logger);
    expect(await store.restore()).toBeNull();
    expect(logger.warn).toHaveBeenCalledOnce();
    expect(logger.warn.mock.calls[0][0]).toContain(`Ignoring corrupt state file ${file}`);
  });

  it('treats a file with the wrong shape as no snapshot', async () => {
    const file = path.join(dir, 'state.json');
    await writeFile(file, JSON.stringify({ seen_urls: [URL_A] }), 'utf-8');
    const store = new SnapshotStore(file);
    expect(await store.restore()).toBeNull();
    expect((await store.load()).seen.size).toBe(0);
  });

  it('rejects an unknown CI state in the file', async () => {
    const file = path.join(dir, 'state.json');
    const body = { ...serializeSnapshot(sampleSnapshot()), ciStates: { [URL_A]: 'green' } };
    await writeFile(file, JSON.stringify(body), 'utf-8');
    expect(await new SnapshotStore(file).restore()).toBeNull();
  });

  it('flushes the temp file to disk before renaming it into place', async () => {
    diskOps.length = 0;
    await new SnapshotStore(path.join(dir, 'state.json')).save(sampleSnapshot());
    expect(diskOps).toEqual(['open', 'sync', 'rename']);
  });

  it('propagates write failures and keeps the previous file', async () => {
    const file = path.join(dir, 'state.json');
    const store = new SnapshotStore(file);
    await store.save(sampleSnapshot());

    // A directory squatting on the temp path makes the write fail
    const blocker = path.join(dir, `.state.json.${process.pid}.tmp`);
    await mkdir(blocker);

    await expect(store.save({ ...sampleSnapshot(), seen: new Set() })).rejects.toThrow();
    expect(await store.load()).toEqual(sampleSnapshot());
  });
});
