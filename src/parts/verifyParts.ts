import { promises as fs } from "fs";
import { digestsEqual, sha256File } from "../core/digest.js";
import { MissingPartsError, PartDigestMismatchError } from "../core/errors.js";
import { silentReporter, type Reporter } from "../core/reporter.js";
import { partPath, type Manifest } from "../manifest/manifest.js";

export interface VerifiedPart {
  fileName: string;
  path: string;
  sha256: string;
  sizeBytes: bigint;
}

export interface PartCheckReport {
  verified: VerifiedPart[];
  missing: string[];
}

/** Rejects a part before it is read, by throwing. */
export type PartGuard = (directory: string, fileName: string) => Promise<void>;

export interface PartCheckOptions {
  reporter?: Reporter;
  readBufferBytes?: number;
  partGuard?: PartGuard;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

/**
 * Walks parts in manifest order. Absent parts are collected; the first digest
 * mismatch throws straight away.
 */
export async function checkParts(manifest: Manifest, opts: PartCheckOptions = {}): Promise<PartCheckReport> {
  const reporter = opts.reporter ?? silentReporter;
  const verified: VerifiedPart[] = [];
  const missing: string[] = [];

  for (const part of manifest.parts) {
    const full = partPath(manifest, part.fileName);
    if (opts.partGuard) await opts.partGuard(manifest.directory, part.fileName);
    if (!(await isRegularFile(full))) {
      reporter.info(`Missing: ${part.fileName}`);
      missing.push(part.fileName);
      continue;
    }
    const { sha256, sizeBytes } = await sha256File(full, { bufferBytes: opts.readBufferBytes });
    if (!digestsEqual(sha256, part.sha256)) {
      throw new PartDigestMismatchError(part.fileName, part.sha256, sha256);
    }
    verified.push({ fileName: part.fileName, path: full, sha256, sizeBytes });
  }

  return { verified, missing };
}

export async function verifyParts(manifest: Manifest, opts: PartCheckOptions = {}): Promise<VerifiedPart[]> {
  const { verified, missing } = await checkParts(manifest, opts);
  if (missing.length) throw new MissingPartsError(missing);
  return verified;
}
