import { writeFile } from "fs/promises";
import path from "path";
import { Writable } from "stream";
import { sha256Hex } from "../src/core/digest.js";

export const EMPTY_SHA256 = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

export interface ManifestFields {
  format?: string;
  originalFile?: string;
  originalSize?: string | null;
  originalSha256: string;
  partPrefix?: string;
  parts: Array<[string, string]>;
}

export function manifestText(f: ManifestFields): string {
  const lines = [`FORMAT=${f.format ?? "img-split-v1"}`, `ORIGINAL_FILE=${f.originalFile ?? "disk.img"}`];
  if (f.originalSize !== null && f.originalSize !== undefined) lines.push(`ORIGINAL_SIZE=${f.originalSize}`);
  lines.push(`ORIGINAL_SHA256=${f.originalSha256}`, `PART_PREFIX=${f.partPrefix ?? "disk.img.part"}`, "PARTS_BEGIN");
  for (const [name, sha] of f.parts) lines.push(`${name} ${sha}`);
  lines.push("PARTS_END", "");
  return lines.join("\n");
}

export interface SplitFixture {
  manifestPath: string;
  original: Buffer;
  parts: Array<{ name: string; data: Buffer }>;
}

/**
 * Writes `chunks[i]` to `names[i]` inside `dir` and a manifest describing
 * them. `names` is the concatenation order; `manifestOrder` only changes the
 * order the parts are listed in.
 */
export async function writeSplit(
  dir: string,
  names: string[],
  chunks: string[],
  opts: { manifestOrder?: string[]; originalSize?: string | null; format?: string; manifestName?: string } = {}
): Promise<SplitFixture> {
  const parts = names.map((name, i) => ({ name, data: Buffer.from(chunks[i] ?? "", "utf8") }));
  for (const p of parts) await writeFile(path.join(dir, p.name), p.data);

  const original = Buffer.concat(parts.map((p) => p.data));
  const digests = new Map(parts.map((p): [string, string] => [p.name, sha256Hex(p.data)]));
  const order = opts.manifestOrder ?? names;

  const manifestPath = path.join(dir, opts.manifestName ?? "disk.manifest.txt");
  await writeFile(
    manifestPath,
    manifestText({
      format: opts.format,
      originalSize: opts.originalSize === undefined ? String(original.byteLength) : opts.originalSize,
      originalSha256: sha256Hex(original),
      parts: order.map((name): [string, string] => [name, digests.get(name) ?? EMPTY_SHA256])
    })
  );
  return { manifestPath, original, parts };
}

export function captureStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      chunks.push(chunk.toString());
      cb();
    }
  });
  return { stream, text: () => chunks.join("") };
}
