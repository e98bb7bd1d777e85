import path from "path";

/** Bucket for files whose name carries no extension. */
export const FALLBACK_BUCKET = "noext";

export type Classification = {
  extension: string;
  bucket: string;
};

/**
 * Get the lower-cased extension of a file name, without the dot.
 * Dotfiles such as `.bashrc` and names ending in a bare dot have none.
 */
export function extensionOf(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

export function bucketFor(extension: string): string {
  return extension || FALLBACK_BUCKET;
}

export function classify(fileName: string): Classification {
  const extension = extensionOf(fileName);
  return { extension, bucket: bucketFor(extension) };
}
