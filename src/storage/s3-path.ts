export interface S3Location {
  bucket: string;
  key: string;
}

const PLACEHOLDERS = new Set(["na", "n/a", "none", "null", "-", "--"]);

export function parseS3Url(url: string): S3Location {
  const rest = url.replace(/^s3:\/\//i, "");
  const slash = rest.indexOf("/");
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? "" : rest.slice(slash + 1);
  if (!bucket || !key) {
    throw new Error(`Invalid S3 path: ${url}`);
  }
  return { bucket, key };
}

/**
 * `s3://bucket/key` is taken as-is; anything else is a key under the default
 * bucket and prefix.
 */
export function resolveS3Path(
  s3Path: string,
  defaults: { bucket: string; prefix: string },
): S3Location {
  const s = s3Path.trim();
  if (!s) throw new Error("Empty s3_path");
  if (s.toLowerCase().startsWith("s3://")) return parseS3Url(s);

  const prefix = defaults.prefix.replace(/^\/+|\/+$/g, "");
  const key = s.replace(/^\/+/, "");
  return { bucket: defaults.bucket, key: prefix ? `${prefix}/${key}` : key };
}

export function isValidS3Path(s3Path: string | null | undefined): s3Path is string {
  if (!s3Path) return false;
  const s = s3Path.trim().toLowerCase();
  if (PLACEHOLDERS.has(s)) return false;
  return s.endsWith(".pdf") || s.startsWith("s3://");
}

export function formatS3Url(location: S3Location): string {
  return `s3://${location.bucket}/${location.key}`;
}
