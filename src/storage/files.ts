import { type FileHandle, mkdir, open, rm } from "node:fs/promises";
import { join } from "node:path";
import { StorageWriteError, describeCause } from "../errors.js";

const MAX_SUFFIX = 1000;

export interface NewFile {
  ext: string;
  content: string;
}

function isExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

async function createExclusive(path: string): Promise<FileHandle | null> {
  try {
    return await open(path, "wx");
  } catch (err) {
    if (isExistsError(err)) return null;
    throw err;
  }
}

/**
 * Write sibling files `<dir>/<stem><ext>` that share one stem, without
 * overwriting anything. The stem is `base`, then `base-2`, `base-3`, ...
 * until every name in the set is free. Returns the stem used.
 */
export async function writeNewFiles(dir: string, base: string, files: readonly NewFile[]): Promise<string> {
  const target = join(dir, `${base}${files[0]?.ext ?? ""}`);
  try {
    await mkdir(dir, { recursive: true });

    for (let n = 1; n <= MAX_SUFFIX; n++) {
      const stem = n === 1 ? base : `${base}-${n}`;
      const claimed: string[] = [];
      let clash = false;

      try {
        for (const file of files) {
          const path = join(dir, `${stem}${file.ext}`);
          const handle = await createExclusive(path);
          if (!handle) {
            clash = true;
            break;
          }
          claimed.push(path);
          try {
            await handle.writeFile(file.content, "utf-8");
          } finally {
            await handle.close();
          }
        }
      } catch (err) {
        await Promise.all(claimed.map((path) => rm(path, { force: true })));
        throw err;
      }

      if (!clash) return stem;
      // Release this stem's partial claim before trying the next one.
      await Promise.all(claimed.map((path) => rm(path, { force: true })));
    }
  } catch (err) {
    throw new StorageWriteError(target, describeCause(err));
  }

  throw new StorageWriteError(target, "Too many files with the same name");
}

/** Single-file form of writeNewFiles. Returns the filename used. */
export async function writeNewFile(dir: string, base: string, ext: string, content: string): Promise<string> {
  const stem = await writeNewFiles(dir, base, [{ ext, content }]);
  return `${stem}${ext}`;
}
