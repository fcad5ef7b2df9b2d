export interface ShardFileSystem {
  read(locator: string): Promise<Buffer>;
  write(locator: string, data: Buffer | string): Promise<void>;
  remove(locator: string): Promise<void>;
}
