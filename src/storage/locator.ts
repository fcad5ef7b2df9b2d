import path from "node:path";

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

export function locatorScheme(locator: string): string {
  const match = SCHEME_PATTERN.exec(locator);
  return match ? match[1].toLowerCase() : "file";
}

export function joinLocator(base: string, ...parts: string[]): string {
  if (locatorScheme(base) === "file" && !base.startsWith("file://")) {
    return path.join(base, ...parts);
  }
  return [base.replace(/\/+$/, ""), ...parts.map((part) => part.replace(/^\/+|\/+$/g, ""))].join("/");
}

export function toLocalPath(locator: string): string {
  return locator.startsWith("file://") ? decodeURIComponent(new URL(locator).pathname) : locator;
}

export interface S3Location {
  bucket: string;
  key: string;
}

export function parseS3Locator(locator: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(locator);
  if (!match) {
    throw new Error(`Invalid S3 locator: ${locator}`);
  }
  return { bucket: match[1], key: match[2] };
}
