import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import fsExtra from "fs-extra";

import { ensureLf, ensureTrailingNewline } from "../report/deterministic.js";

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export async function readTextFile(path: string): Promise<string | null> {
  try {
    const content = await fs.readFile(path, "utf8");
    return content;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
      return null;
    }
    throw error;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await fsExtra.ensureDir(dirname(path));
  const normalized = ensureTrailingNewline(ensureLf(content));
  await fs.writeFile(path, normalized, "utf8");
}

export async function pathExists(path: string): Promise<boolean> {
  return fsExtra.pathExists(path);
}
