import fs from "node:fs/promises";
import createDebug from "debug";
import { ConfigurationError, parseSnapshot, serializeSnapshot } from "tesserajs";
import type { BatchSnapshot, SnapshotStore } from "tesserajs";

import { isMissing, writeFileAtomic } from "./fs.js";

const debug = createDebug("tessera-node:snapshots");

const RUN_ID = "{runId}";

/**
 * Snapshot written to a JSON file
 *
 * `{runId}` in the path template is replaced by the run identifier. A
 * snapshot never overwrites an existing file: snapshots are append-only.
 */
export class SnapshotFile implements SnapshotStore {
  constructor(readonly pathTemplate: string) {}

  pathOf(runId: string): string {
    return this.pathTemplate.replaceAll(RUN_ID, runId);
  }

  /**
   * Refuse a fixed output path that is already taken, before a run starts
   *
   * @throws ConfigurationError
   */
  async ensureWritable(): Promise<void> {
    if (this.pathTemplate.includes(RUN_ID)) return;
    if (await exists(this.pathTemplate))
      throw new ConfigurationError(
        `snapshot ${this.pathTemplate} already exists, use ${RUN_ID} in the output path to keep one per run`,
      );
  }

  async write(snapshot: BatchSnapshot): Promise<string> {
    const file = this.pathOf(snapshot.metadata.runId);
    await writeFileAtomic(file, serializeSnapshot(snapshot), {
      exclusive: true,
    });
    debug("stored snapshot of run %s in %s", snapshot.metadata.runId, file);

    return file;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (e) {
    if (isMissing(e)) return false;
    throw e;
  }
}

/** @throws SerializationError when the file is not a valid snapshot */
export async function loadSnapshot(file: string): Promise<BatchSnapshot> {
  return parseSnapshot(await fs.readFile(file, "utf8"));
}
