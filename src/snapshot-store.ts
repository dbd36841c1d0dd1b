import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import * as path from 'node:path';
import { sanitizeError } from './errors.js';
import { silentLogger, type Logger } from './output.js';
import { emptySnapshot, type SnapshotPersistence } from './reconciler.js';
import { SnapshotFileSchema, type SnapshotFile } from './schemas.js';
import type { Snapshot } from './types.js';

/** Convert a snapshot to its on-disk JSON shape */
export function serializeSnapshot(snapshot: Snapshot): SnapshotFile {
  return {
    version: 1,
    seenUrls: [...snapshot.seen],
    commentCounts: Object.fromEntries(snapshot.commentCount),
    reviewStates: Object.fromEntries(snapshot.reviewState),
    ciStates: Object.fromEntries(snapshot.ciState),
  };
}

/** Rebuild a snapshot from its validated on-disk shape */
export function deserializeSnapshot(file: SnapshotFile): Snapshot {
  return {
    seen: new Set(file.seenUrls),
    commentCount: new Map(Object.entries(file.commentCounts)),
    reviewState: new Map(Object.entries(file.reviewStates)),
    ciState: new Map(Object.entries(file.ciStates)),
  };
}

/**
 * JSON file holding the reconciliation snapshot.
 *
 * Writes go to a temp file in the same directory, flushed to disk, which is
 * then renamed over the target. A crash mid-write leaves the previous file
 * intact.
 */
export class SnapshotStore implements SnapshotPersistence {
  private readonly logger: Logger;

  constructor(readonly filePath: string, logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  /** The stored snapshot, or null if the file is missing, unreadable or invalid */
  async restore(): Promise<Snapshot | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      this.logger.warn(`Could not read state file ${this.filePath}: ${sanitizeError(error)}`);
      return null;
    }

    try {
      return deserializeSnapshot(SnapshotFileSchema.parse(JSON.parse(text)));
    } catch (error: unknown) {
      this.logger.warn(`Ignoring corrupt state file ${this.filePath}: ${sanitizeError(error)}`);
      return null;
    }
  }

  /** The stored snapshot, or an empty one */
  async load(): Promise<Snapshot> {
    return (await this.restore()) ?? emptySnapshot();
  }

  async save(snapshot: Snapshot): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    const body = JSON.stringify(serializeSnapshot(snapshot), null, 2) + '\n';

    await mkdir(dir, { recursive: true });
    try {
      const handle = await open(tmpPath, 'w', 0o600);
      try {
        await handle.writeFile(body, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.filePath);
    } catch (error: unknown) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug(`Could not remove ${tmpPath}: ${sanitizeError(cleanupError)}`);
      });
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
