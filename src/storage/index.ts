export type { DefinitionStorage } from "./storage.js";
export { FileSystemStorage } from "./fs.js";
export { S3Storage, parseS3Location } from "./s3.js";
export type { S3StorageOptions } from "./s3.js";

import type { DefinitionStorage } from "./storage.js";
import { FileSystemStorage } from "./fs.js";
import { S3Storage } from "./s3.js";
import type { S3StorageOptions } from "./s3.js";

export function isS3Location(location: string): boolean {
  return location.startsWith("s3://");
}

export function openStorage(
  location: string,
  options: S3StorageOptions = {},
): DefinitionStorage {
  return isS3Location(location)
    ? new S3Storage(location, options)
    : new FileSystemStorage(location);
}
