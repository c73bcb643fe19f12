/**
 * Atomic File Writes
 *
 * Content is always written to a hidden temp file beside its target first,
 * so a crash or a failed write never leaves a truncated file under the
 * real name.
 */

import { link, mkdir, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { errnoCode } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("AtomicFile");

/** Distinguishes temp files created within the same millisecond */
let tempCounter = 0;

/**
 * Temp path beside `path`. The leading dot and the `.tmp` suffix keep it
 * out of note and session listings.
 */
export function tempPathFor(path: string): string {
  tempCounter++;
  return join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.${tempCounter}.tmp`);
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      log.warn(`Failed to remove temp file ${tempPath}`, error);
    }
  }
}

/**
 * Write a file atomically using temp+rename, replacing any existing file.
 */
export async function atomicWrite(path: string, content: string): Promise<void> {
  const tempPath = tempPathFor(path);

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    await removeTemp(tempPath);
    throw error;
  }
}

/**
 * Write a file only if nothing exists at `path` yet.
 *
 * The finished temp file is hard-linked to `path`, which fails instead of
 * replacing an existing file, so `path` appears complete or not at all.
 *
 * @returns false if `path` was already taken
 */
export async function writeExclusive(path: string, content: string): Promise<boolean> {
  const tempPath = tempPathFor(path);

  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tempPath, content, "utf-8");
    try {
      await link(tempPath, path);
    } catch (error) {
      if (errnoCode(error) === "EEXIST") {
        return false;
      }
      throw error;
    }
    return true;
  } finally {
    await removeTemp(tempPath);
  }
}
