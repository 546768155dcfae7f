import { promises as fs } from "fs";
import path from "path";
import { digestsEqual, sha256File } from "../core/digest.js";
import { FinalDigestMismatchError } from "../core/errors.js";
import type { Manifest } from "../manifest/manifest.js";

export interface SizeMismatch {
  expected: bigint;
  actual: bigint;
}

export interface OutputVerification {
  outputPath: string;
  sha256: string;
  sizeBytes: bigint;
  sizeMismatch: SizeMismatch | null;
}

/**
 * The digest is authoritative. A size that disagrees with ORIGINAL_SIZE is
 * only reported back as `sizeMismatch`.
 */
export async function verifyOutput(
  manifest: Manifest,
  outputPath: string,
  opts: { readBufferBytes?: number } = {}
): Promise<OutputVerification> {
  const full = path.resolve(outputPath);
  const { sha256 } = await sha256File(full, { bufferBytes: opts.readBufferBytes });
  const { size } = await fs.stat(full, { bigint: true });

  if (!digestsEqual(sha256, manifest.originalDigest)) {
    throw new FinalDigestMismatchError(full, manifest.originalDigest, sha256);
  }

  const sizeMismatch =
    manifest.originalSize !== null && manifest.originalSize !== size
      ? { expected: manifest.originalSize, actual: size }
      : null;

  return { outputPath: await fs.realpath(full), sha256, sizeBytes: size, sizeMismatch };
}
