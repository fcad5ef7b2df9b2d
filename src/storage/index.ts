import { LocalFileSystem } from "./localFileSystem";
import { locatorScheme } from "./locator";
import { S3FileSystem } from "./s3FileSystem";
import type { ShardFileSystem } from "./types";

/** Picks a file system by locator scheme; instances are created once and reused. */
export class FileSystemRegistry {
  private readonly instances = new Map<string, ShardFileSystem>();

  constructor(overrides?: Record<string, ShardFileSystem>) {
    for (const [scheme, fileSystem] of Object.entries(overrides ?? {})) {
      this.instances.set(scheme, fileSystem);
    }
  }

  resolve(locator: string): ShardFileSystem {
    const scheme = locatorScheme(locator);
    const existing = this.instances.get(scheme);
    if (existing) {
      return existing;
    }

    let created: ShardFileSystem;
    switch (scheme) {
      case "file":
        created = new LocalFileSystem();
        break;
      case "s3":
        created = new S3FileSystem();
        break;
      default:
        throw new Error(`Unsupported storage scheme: ${scheme}`);
    }
    this.instances.set(scheme, created);
    return created;
  }
}

export * from "./locator";
export * from "./localFileSystem";
export * from "./s3FileSystem";
export * from "./types";
