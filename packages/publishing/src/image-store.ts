import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createChildLogger } from "@notes-to-blog/core";
import type { ImagePayload } from "@notes-to-blog/services";

const logger = createChildLogger({ module: "publishing:images" });

/**
 * Writes generated images into one directory. Existing files are never
 * replaced: a taken name gets a numeric suffix (`post-header-2.png`).
 */
export class FileImageStore {
  constructor(private readonly imagesDir: string) {}

  async save(payload: ImagePayload, baseName: string): Promise<string> {
    await mkdir(this.imagesDir, { recursive: true });

    for (let n = 1; ; n++) {
      const name = n === 1 ? baseName : `${baseName}-${n}`;
      const filePath = join(this.imagesDir, `${name}.${payload.extension}`);
      try {
        await writeFile(filePath, payload.data, { flag: "wx" });
      } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "EEXIST") continue;
        throw err;
      }
      logger.debug({ filePath, bytes: payload.data.byteLength, model: payload.model }, "Image saved");
      return filePath;
    }
  }
}
