import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

async function fsyncDirectoryIfSupported(dirPath: string): Promise<void> {
  let dirHandle: FileHandle | undefined;
  try {
    dirHandle = await fs.open(dirPath, "r");
    await dirHandle.sync();
  } catch {
    // some platforms cannot open or sync a directory
    return;
  } finally {
    if (dirHandle) {
      await dirHandle.close();
    }
  }
}

/**
 * Write through a temp file in the same directory, then rename over the target,
 * so readers only ever see the previous or the next full document. The directory
 * is synced afterwards so the rename itself survives a crash.
 */
export async function writeFileAtomically(
  targetPath: string,
  data: string,
  options: { readonly mode?: number } = {}
): Promise<void> {
  const dirPath = path.dirname(targetPath);
  const fileMode = options.mode ?? 0o600;
  const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;

  await fs.mkdir(dirPath, { recursive: true, mode: 0o700 });

  let fileHandle: FileHandle | undefined;
  try {
    fileHandle = await fs.open(tempPath, "wx", fileMode);
    await fileHandle.writeFile(data, "utf8");
    await fileHandle.sync();
  } catch (err) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw err;
  } finally {
    if (fileHandle) {
      await fileHandle.close();
    }
  }

  try {
    await fs.rename(tempPath, targetPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw err;
  }

  await fsyncDirectoryIfSupported(dirPath);
}
