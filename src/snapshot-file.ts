/**
 * Snapshot File
 *
 * Reads and writes a `StoreSnapshot` as pretty-printed JSON. Writes go to
 * `<file>.tmp` first and are renamed over the target, so a crash mid-write
 * leaves either the old or the new snapshot on disk.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { GoalTrackerError, GoalTrackerErrorCode } from './core-domain';
import { InMemoryEventStore, StoreSnapshotSchema, emptySnapshot, type StoreSnapshot } from './core-db';
import { logger as defaultLogger, type Logger } from './logger';

export async function atomicWriteFile(filePath: string, data: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, data, 'utf-8');
  await rename(tmpPath, filePath);
}

function parseSnapshot(content: string, source: string): StoreSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new GoalTrackerError(
      GoalTrackerErrorCode.PARSING_FAILED,
      `${source} is not valid JSON`,
      false,
      { cause: error }
    );
  }
  const result = StoreSnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw GoalTrackerError.invalidInput(result.error, `snapshot ${source}`);
  }
  return result.data;
}

/**
 * Load a snapshot. A missing file is an empty store; a missing file with a
 * leftover `.tmp` means the last write was interrupted after the tmp file
 * was complete, so that copy is used.
 */
export async function loadSnapshot(
  filePath: string,
  logger: Logger = defaultLogger
): Promise<StoreSnapshot> {
  if (existsSync(filePath)) {
    return parseSnapshot(await readFile(filePath, 'utf-8'), filePath);
  }

  const tmpPath = `${filePath}.tmp`;
  if (existsSync(tmpPath)) {
    logger.warn({ filePath }, 'Snapshot missing, recovering from .tmp');
    const snapshot = parseSnapshot(await readFile(tmpPath, 'utf-8'), tmpPath);
    await rename(tmpPath, filePath);
    return snapshot;
  }

  logger.debug({ filePath }, 'No snapshot yet, starting empty');
  return emptySnapshot();
}

export async function saveSnapshot(filePath: string, snapshot: StoreSnapshot): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`);
}

/**
 * Store bound to a snapshot file. Mutations stay in memory until `flush`.
 */
export class FileBackedEventStore extends InMemoryEventStore {
  private constructor(
    private readonly filePath: string,
    snapshot: StoreSnapshot
  ) {
    super(snapshot);
  }

  static async open(filePath: string, logger: Logger = defaultLogger): Promise<FileBackedEventStore> {
    return new FileBackedEventStore(filePath, await loadSnapshot(filePath, logger));
  }

  async flush(): Promise<void> {
    await saveSnapshot(this.filePath, this.toSnapshot());
  }
}
