import { createHash } from "crypto";
import { promises as fs } from "fs";

export const DEFAULT_READ_BUFFER_BYTES = 1024 * 1024;

export interface FileDigest {
  sha256: string;
  sizeBytes: bigint;
}

export async function sha256File(filePath: string, opts: { bufferBytes?: number } = {}): Promise<FileDigest> {
  const hash = createHash("sha256");
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(opts.bufferBytes ?? DEFAULT_READ_BUFFER_BYTES);
    let total = 0n;
    for (;;) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, null);
      if (bytesRead === 0) break;
      total += BigInt(bytesRead);
      hash.update(buf.subarray(0, bytesRead));
    }
    return { sha256: hash.digest("hex"), sizeBytes: total };
  } finally {
    await fd.close();
  }
}

export function sha256Hex(data: string | Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export function digestsEqual(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
