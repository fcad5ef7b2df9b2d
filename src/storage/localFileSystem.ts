import fs from "node:fs";
import path from "node:path";
import { toLocalPath } from "./locator";
import type { ShardFileSystem } from "./types";

export class LocalFileSystem implements ShardFileSystem {
  async read(locator: string): Promise<Buffer> {
    return fs.promises.readFile(toLocalPath(locator));
  }

  async write(locator: string, data: Buffer | string): Promise<void> {
    const filePath = toLocalPath(locator);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, data);
  }

  async remove(locator: string): Promise<void> {
    await fs.promises.unlink(toLocalPath(locator));
  }
}
