import type { BucketPath } from "../ports/engine"
import { StorageError } from "./store-errors"

/** Stable text id of a bucket path. */
export function bucketId(path: BucketPath): string {
  if (path.length === 0) throw StorageError.invalidBucketPath("empty path")
  if (path.some((segment) => segment === "")) {
    throw StorageError.invalidBucketPath("empty segment")
  }

  return JSON.stringify(path)
}

/**
 * Prefix shared by the ids of all buckets nested (at any depth) under `path`.
 * `["a"]` gives `["a",` which `["a","b"]` starts with and `["ab"]` does not.
 */
export function descendantPrefix(path: BucketPath): string {
  return `${bucketId(path).slice(0, -1)},`
}

/** `path` and each of its ancestors, outermost first. */
export function lineage(path: BucketPath): BucketPath[] {
  return path.map((_, i) => path.slice(0, i + 1))
}
