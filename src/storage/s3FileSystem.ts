import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { parseS3Locator } from "./locator";
import type { ShardFileSystem } from "./types";

export class S3FileSystem implements ShardFileSystem {
  private readonly client: S3Client;

  constructor(client?: S3Client) {
    this.client = client ?? new S3Client({});
  }

  async read(locator: string): Promise<Buffer> {
    const { bucket, key } = parseS3Locator(locator);
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`S3 object has no body: ${locator}`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async write(locator: string, data: Buffer | string): Promise<void> {
    const { bucket, key } = parseS3Locator(locator);
    await this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: data }));
  }

  async remove(locator: string): Promise<void> {
    const { bucket, key } = parseS3Locator(locator);
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}
