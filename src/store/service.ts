/**
 * Store Module - Service Layer
 *
 * JSON file holding enabled/snooze settings per door. The whole file is
 * rewritten on every save: writes are serialised and land through a
 * temporary file plus rename, so a crash never leaves a half-written file.
 */
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { type Result, err, ok } from "neverthrow";

import type { DoorSettings, DoorStateStore } from "../door/index.js";
import { createLogger } from "../logger.js";
import {
  type StoreError,
  formatStoreError,
  invalidContent,
  readFailed,
  writeFailed,
} from "./errors.js";
import { EMPTY_STATE, type StateFile, StateFileSchema } from "./schema.js";

const log = createLogger("store");

export interface FileStateStore extends DoorStateStore {
  readonly path: string;
  /** Read the file into memory; a missing file is an empty store */
  load(): Promise<Result<StateFile, StoreError>>;
  get(doorId: string): DoorSettings | undefined;
  save(doorId: string, settings: DoorSettings): Promise<Result<void, StoreError>>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function createFileStateStore(path: string): FileStateStore {
  let current: StateFile = EMPTY_STATE;
  let writes: Promise<unknown> = Promise.resolve();
  let writeCount = 0;

  async function writeAtomically(content: StateFile): Promise<Result<void, StoreError>> {
    writeCount++;
    const tempPath = `${path}.${process.pid}.${writeCount}.tmp`;

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, `${JSON.stringify(content, null, 2)}\n`, "utf8");
      await rename(tempPath, path);
      return ok(undefined);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanup: unknown) => {
        log.warn({ tempPath, error: toError(cleanup).message }, "Failed to remove temp file");
      });
      const cause = toError(error);
      const storeError = writeFailed(path, cause.message, cause);
      log.error({ path, error: cause.message }, formatStoreError(storeError));
      return err(storeError);
    }
  }

  return {
    path,

    async load() {
      let raw: string;
      try {
        raw = await readFile(path, "utf8");
      } catch (error) {
        if (isMissingFile(error)) {
          log.info({ path }, "No state file yet, starting empty");
          current = EMPTY_STATE;
          return ok(current);
        }
        const cause = toError(error);
        return err(readFailed(path, cause.message, cause));
      }

      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (error) {
        return err(invalidContent(path, toError(error).message));
      }

      const parsed = StateFileSchema.safeParse(data);
      if (!parsed.success) {
        return err(invalidContent(path, parsed.error.message));
      }

      current = parsed.data;
      log.info({ path, doors: Object.keys(current.doors).length }, "State file loaded");
      return ok(current);
    },

    get(doorId) {
      return current.doors[doorId];
    },

    save(doorId, settings) {
      current = { doors: { ...current.doors, [doorId]: { ...settings } } };
      const snapshot = current;

      const run = writes.then(() => writeAtomically(snapshot));
      writes = run;
      return run;
    },
  };
}
