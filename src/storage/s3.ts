import {
  GetObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from "@aws-sdk/client-s3";
import type { DefinitionStorage } from "./storage.js";

export interface S3StorageOptions {
  client?: S3Client;
  region?: string;
  timeoutMs?: number;
}

export function parseS3Location(location: string): { bucket: string; prefix: string } {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(location);
  if (!match) {
    throw new Error(`Not an S3 location: ${location}`);
  }
  const [, bucket, rest] = match;
  const prefix = rest === "" || rest.endsWith("/") ? rest : `${rest}/`;
  return { bucket, prefix };
}

/**
 * Treats an S3 key prefix as a directory. Only objects directly under the
 * prefix are listed.
 */
export class S3Storage implements DefinitionStorage {
  readonly location: string;
  readonly bucket: string;
  readonly prefix: string;

  private readonly client: S3Client;
  private readonly timeoutMs?: number;

  constructor(location: string, options: S3StorageOptions = {}) {
    const { bucket, prefix } = parseS3Location(location);
    this.location = location;
    this.bucket = bucket;
    this.prefix = prefix;
    this.client = options.client ?? new S3Client({ region: options.region });
    this.timeoutMs = options.timeoutMs;
  }

  pathOf(fileName: string): string {
    return `s3://${this.bucket}/${this.prefix}${fileName}`;
  }

  async isDirectory(): Promise<boolean> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: this.prefix,
        MaxKeys: 1,
      }),
      this.sendOptions(),
    );
    return (response.KeyCount ?? 0) > 0;
  }

  async listFiles(): Promise<string[]> {
    const names: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.prefix,
          Delimiter: "/",
          ContinuationToken: continuationToken,
        }),
        this.sendOptions(),
      );
      for (const object of response.Contents ?? []) {
        const name = object.Key?.slice(this.prefix.length);
        if (name) names.push(name);
      }
      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return names.sort();
  }

  async readText(fileName: string): Promise<string> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: `${this.prefix}${fileName}`,
      }),
      this.sendOptions(),
    );
    if (!response.Body) {
      throw new Error(`Empty response body for ${this.pathOf(fileName)}`);
    }
    return response.Body.transformToString("utf-8");
  }

  private sendOptions(): { abortSignal?: AbortSignal } {
    return this.timeoutMs ? { abortSignal: AbortSignal.timeout(this.timeoutMs) } : {};
  }
}
