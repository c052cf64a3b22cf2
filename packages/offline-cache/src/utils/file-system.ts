/**
 * File System Utilities
 *
 * Handles file and directory operations on the cache directory.
 */

import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import * as path from "node:path";
import { FilesystemError, errnoCode } from "@helpmirror/catalog-sdk";

const UTF8_BOM = "\uFEFF";

/**
 * Runs an fs operation, rethrowing failures as FilesystemError
 */
export async function withFilesystemError<T>(
  targetPath: string,
  action: string,
  operation: () => Promise<T>,
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof FilesystemError) {
      throw error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new FilesystemError(
      `Failed to ${action} '${targetPath}': ${detail}`,
      targetPath,
      error,
    );
  }
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (errnoCode(error) !== "EEXIST") {
      throw error;
    }
  }
}

/**
 * Stats a file, returning null when it does not exist
 */
export async function statIfExists(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Writes UTF-8 text preceded by a byte-order mark
 */
export async function writeTextWithBom(
  filePath: string,
  content: string,
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, `${UTF8_BOM}${content}`, "utf-8");
}

/**
 * Deletes a file
 */
export async function deleteFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Sets the access and modification times of a file
 */
export async function setFileTimes(filePath: string, time: Date): Promise<void> {
  await fs.utimes(filePath, time, time);
}

/**
 * Lists all files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return [];
    }
    throw error;
  }
}
