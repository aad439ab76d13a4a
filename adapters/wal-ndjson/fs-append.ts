import type { FileHandle } from "fs/promises";

/** Append and flush to disk before resolving. */
export async function appendAndSync(handle: FileHandle, content: string): Promise<void> {
  await handle.appendFile(content, { encoding: "utf8" });
  await handle.datasync();
}
