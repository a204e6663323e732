import { mkdir, open, rm, stat } from "fs/promises";
import type { FileSystem, WritableFile } from "../ports/file-system.js";

/**
 * FileSystem backed by fs/promises.
 */
export const nodeFileSystem: FileSystem = {
  async ensureDir(path: string): Promise<void> {
    await mkdir(path, { recursive: true });
  },

  async openForWrite(path: string): Promise<WritableFile> {
    const handle = await open(path, "w");
    return {
      async write(chunk: Uint8Array): Promise<void> {
        let offset = 0;
        while (offset < chunk.byteLength) {
          const { bytesWritten } = await handle.write(chunk, offset, chunk.byteLength - offset);
          offset += bytesWritten;
        }
      },
      close: () => handle.close(),
    };
  },

  async remove(path: string): Promise<void> {
    await rm(path, { force: true });
  },

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return false;
      }
      throw error;
    }
  },
};
