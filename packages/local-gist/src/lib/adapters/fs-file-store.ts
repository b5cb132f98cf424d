import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { FileStore } from "../ports/file-store.js";

/**
 * File store backed by the local file system.
 */
export const fsFileStore: FileStore = {
  async write(path: string, data: Uint8Array): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  },
};
