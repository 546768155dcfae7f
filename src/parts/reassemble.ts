import { promises as fs } from "fs";
import path from "path";
import { DEFAULT_READ_BUFFER_BYTES } from "../core/digest.js";
import { sortNatural } from "../core/naturalSort.js";
import { partPath, type Manifest, type ManifestPart } from "../manifest/manifest.js";

export const DEFAULT_OUTPUT_NAME = "reassembled.img";

export interface ReassembleResult {
  outputPath: string;
  order: string[];
  bytesWritten: bigint;
}

export function concatenationOrder(parts: readonly ManifestPart[]): string[] {
  return sortNatural(parts.map((p) => p.fileName));
}

async function appendFile(out: fs.FileHandle, sourcePath: string, buf: Buffer): Promise<bigint> {
  const src = await fs.open(sourcePath, "r");
  try {
    let total = 0n;
    for (;;) {
      const { bytesRead } = await src.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      await out.write(buf, 0, bytesRead);
      total += BigInt(bytesRead);
    }
    return total;
  } finally {
    await src.close();
  }
}

/**
 * Truncates `outputPath` and writes every part into it in natural filename
 * order, which is not necessarily the manifest order.
 */
export async function reassemble(
  manifest: Manifest,
  outputPath: string,
  opts: { readBufferBytes?: number } = {}
): Promise<ReassembleResult> {
  const full = path.resolve(outputPath);
  const order = concatenationOrder(manifest.parts);
  const buf = Buffer.alloc(opts.readBufferBytes ?? DEFAULT_READ_BUFFER_BYTES);

  const out = await fs.open(full, "w");
  let bytesWritten = 0n;
  try {
    for (const fileName of order) {
      bytesWritten += await appendFile(out, partPath(manifest, fileName), buf);
    }
  } finally {
    await out.close();
  }
  return { outputPath: full, order, bytesWritten };
}
