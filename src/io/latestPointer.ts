import { promises as fs, Stats } from "fs";
import path from "path";
import { ConflictError, hasErrnoCode, isErrnoException } from "../utils/errors";
import { ensureDir, writeText } from "../utils/fs";
import { LATEST_LINK, LATEST_MARKER } from "./paths";

/*
 * A "latest" indirection over bucket directories:
 *
 *   <root>/latest -> <bucket>      relative symlink, preferred
 *   <root>/LATEST_BUCKET           plain-text fallback where symlinks are refused
 */

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return null;
    throw error;
  }
}

async function readMarker(root: string): Promise<string | null> {
  try {
    const text = await fs.readFile(path.join(root, LATEST_MARKER), "utf8");
    const bucket = text.trim();
    return bucket.length > 0 ? bucket : null;
  } catch (error) {
    if (hasErrnoCode(error, "ENOENT")) return null;
    throw error;
  }
}

/**
 * Points `<root>/latest` at `bucket`. Replacing an existing link or marker
 * always succeeds; a real directory named `latest` raises ConflictError and is
 * left untouched. When the OS refuses the symlink, the bucket name is written
 * to `<root>/LATEST_BUCKET` instead. An old link that cannot be removed is an
 * error: it would keep shadowing the marker.
 */
export async function updateLatestPointer(root: string, bucket: string): Promise<void> {
  const name = bucket.trim();
  const latest = path.join(root, LATEST_LINK);
  await ensureDir(root);

  const existing = await lstatOrNull(latest);
  if (existing?.isDirectory()) {
    throw new ConflictError(`'latest' exists and is a real directory: ${latest}`, latest);
  }

  if (existing) {
    await fs.unlink(latest);
  }
  try {
    await fs.symlink(name, latest);
  } catch (error) {
    if (!isErrnoException(error)) throw error;
    await writeText(path.join(root, LATEST_MARKER), name);
    return;
  }

  // The link is authoritative now; a marker from an earlier fallback would only mislead.
  await fs.rm(path.join(root, LATEST_MARKER), { force: true });
}

/**
 * Bucket named by `<root>/latest`, or by the marker file when the link is
 * absent or unreadable. A dangling link still yields its target's name.
 */
export async function resolveLatestBucket(root: string): Promise<string | null> {
  const latest = path.join(root, LATEST_LINK);
  const stat = await lstatOrNull(latest);

  if (stat?.isSymbolicLink()) {
    try {
      const target = await fs.readlink(latest);
      const bucket = path.basename(target);
      if (bucket) return bucket;
    } catch (error) {
      if (!isErrnoException(error)) throw error;
    }
  }

  return readMarker(root);
}
