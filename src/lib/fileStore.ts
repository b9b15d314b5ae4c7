import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

const writeLocks = new Map<string, Promise<void>>();

const withWriteLock = async <T>(filePath: string, task: () => Promise<T>): Promise<T> => {
  const current = writeLocks.get(filePath) ?? Promise.resolve();

  let release!: () => void;
  const next = new Promise<void>((resolve) => {
    release = resolve;
  });

  const queued = current.then(() => next);
  writeLocks.set(filePath, queued);
  await current;

  try {
    return await task();
  } finally {
    release();
    if (writeLocks.get(filePath) === queued) {
      writeLocks.delete(filePath);
    }
  }
};

export const ensureDir = async (dirPath: string): Promise<void> => {
  await fs.mkdir(dirPath, { recursive: true });
};

/** Parsed but unvalidated; callers narrow the result. */
export const readJsonFile = async (filePath: string, fallback: unknown): Promise<unknown> => {
  try {
    const content = await fs.readFile(filePath, "utf8");
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return fallback;
  }
};

export const readBinaryFile = async (filePath: string): Promise<Uint8Array | null> => {
  try {
    const raw = await fs.readFile(filePath);
    return new Uint8Array(raw);
  } catch {
    return null;
  }
};

export const writeBinaryFileAtomic = async (filePath: string, data: Uint8Array): Promise<void> => {
  await ensureDir(path.dirname(filePath));

  await withWriteLock(filePath, async () => {
    const tempFile = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tempFile, data);
    await fs.rename(tempFile, filePath);
  });
};

/** Moves an unreadable file aside so a fresh one can take its place. */
export const quarantineFile = async (filePath: string): Promise<string | null> => {
  try {
    await fs.access(filePath);
  } catch {
    return null;
  }

  const corruptPath = `${filePath}.corrupt-${Date.now()}`;
  await fs.rename(filePath, corruptPath);
  return corruptPath;
};
