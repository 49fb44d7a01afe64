import { randomUUID } from "crypto";
import { rename, unlink, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";

/**
 * Write a file through a temporary file in the same directory followed by a
 * rename, so readers see either the previous content or the new content.
 * The temporary file is removed if the write fails.
 */
export async function atomicWriteFile(
  path: string,
  content: Uint8Array,
): Promise<void> {
  const tempPath = join(
    dirname(path),
    `.${basename(path)}.tmp.${randomUUID()}`,
  );

  try {
    await writeFile(tempPath, content);
    await rename(tempPath, path);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isNotFoundError(cleanupError)) {
        console.warn(`unable to remove ${tempPath}`, cleanupError);
      }
    });
    throw error;
  }
}

export function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
