import { promises as fs } from "fs";
import path from "path";
import * as z from "zod/v4";
import { ManifestError } from "../core/errors.js";

export const MANIFEST_FORMAT = "img-split-v1" as const;

export const PARTS_BEGIN_MARKER = "PARTS_BEGIN";
export const PARTS_END_MARKER = "PARTS_END";

export interface ManifestPart {
  fileName: string;
  sha256: string;
}

export interface Manifest {
  format: typeof MANIFEST_FORMAT;
  manifestPath: string;
  directory: string;
  originalFileName: string;
  originalSize: bigint | null;
  originalDigest: string;
  partPrefix: string;
  parts: ManifestPart[];
}

const zHex64 = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, { error: "expected 64 hex characters", abort: true })
  .transform((s) => s.toLowerCase());

const zPartFileName = z
  .string()
  .min(1)
  .refine((name) => !path.isAbsolute(name), "absolute part names are not allowed")
  .refine((name) => !name.split(/[\\/]/).includes(".."), "part names may not contain '..'");

const zManifestRecord = z.object({
  ORIGINAL_FILE: z.string().default(""),
  ORIGINAL_SIZE: z
    .string()
    // A failed check has to abort, otherwise the transform still runs and BigInt throws.
    .regex(/^[0-9]+$/, { error: "expected a non-negative integer", abort: true })
    .transform((s) => BigInt(s))
    .optional(),
  ORIGINAL_SHA256: zHex64,
  PART_PREFIX: z.string().default(""),
  parts: z
    .array(
      z.object({
        line: z.number().int(),
        fileName: zPartFileName,
        sha256: zHex64
      })
    )
    .min(1, "no parts listed in manifest")
});

type ManifestRecordInput = z.input<typeof zManifestRecord>;

const SCALAR_KEYS = ["FORMAT", "ORIGINAL_FILE", "ORIGINAL_SIZE", "ORIGINAL_SHA256", "PART_PREFIX"] as const;
type ScalarKey = (typeof SCALAR_KEYS)[number];

function scanScalars(lines: string[]): Partial<Record<ScalarKey, string>> {
  const out: Partial<Record<ScalarKey, string>> = {};
  for (const line of lines) {
    for (const key of SCALAR_KEYS) {
      if (out[key] !== undefined) continue;
      if (line.startsWith(`${key}=`)) out[key] = line.slice(key.length + 1);
    }
  }
  return out;
}

function scanPartLines(lines: string[]): Array<{ line: number; text: string }> {
  const out: Array<{ line: number; text: string }> = [];
  let inside = false;
  lines.forEach((text, i) => {
    if (text.startsWith(PARTS_BEGIN_MARKER)) {
      inside = true;
      return;
    }
    if (text.startsWith(PARTS_END_MARKER)) {
      inside = false;
      return;
    }
    if (inside) out.push({ line: i + 1, text });
  });
  return out;
}

function describeIssue(issue: z.ZodError["issues"][number], record: ManifestRecordInput): string {
  const [head, index, field] = issue.path;
  if (head === "parts" && typeof index === "number") {
    const entry = record.parts[index];
    const where = entry ? `line ${entry.line}` : `entry ${index}`;
    return `invalid part ${String(field ?? "entry")} at ${where}: ${issue.message}`;
  }
  if (head === "parts") return issue.message;
  return `invalid ${String(head)}: ${issue.message}`;
}

export function parseManifest(text: string, manifestPath: string): Manifest {
  const absPath = path.resolve(manifestPath);
  const lines = text.split(/\r?\n/);
  const scalars = scanScalars(lines);

  const format = scalars.FORMAT;
  if (format !== MANIFEST_FORMAT) {
    throw new ManifestError(absPath, `unsupported manifest format: ${format ?? "(missing)"}`);
  }

  const parts: ManifestRecordInput["parts"] = [];
  for (const { line, text: raw } of scanPartLines(lines)) {
    const tokens = raw.trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) continue;
    const [fileName, sha256] = tokens;
    if (tokens.length !== 2 || fileName === undefined || sha256 === undefined) {
      throw new ManifestError(absPath, `malformed part line ${line}: expected "<file> <sha256>", got "${raw.trim()}"`);
    }
    parts.push({ line, fileName, sha256 });
  }

  const record: ManifestRecordInput = {
    ORIGINAL_FILE: scalars.ORIGINAL_FILE,
    // An empty ORIGINAL_SIZE= line means "unknown", same as no line.
    ORIGINAL_SIZE: scalars.ORIGINAL_SIZE?.trim() ? scalars.ORIGINAL_SIZE.trim() : undefined,
    ORIGINAL_SHA256: (scalars.ORIGINAL_SHA256 ?? "").trim(),
    PART_PREFIX: scalars.PART_PREFIX,
    parts
  };

  const parsed = zManifestRecord.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const message = issue ? describeIssue(issue, record) : "invalid manifest";
    throw new ManifestError(absPath, message);
  }

  const data = parsed.data;
  return {
    format: MANIFEST_FORMAT,
    manifestPath: absPath,
    directory: path.dirname(absPath),
    originalFileName: data.ORIGINAL_FILE,
    originalSize: data.ORIGINAL_SIZE ?? null,
    originalDigest: data.ORIGINAL_SHA256,
    partPrefix: data.PART_PREFIX,
    parts: data.parts.map((p) => ({ fileName: p.fileName, sha256: p.sha256 }))
  };
}

export async function readManifest(manifestPath: string): Promise<Manifest> {
  const absPath = path.resolve(manifestPath);
  let text: string;
  try {
    const st = await fs.stat(absPath);
    if (!st.isFile()) throw new ManifestError(absPath, `manifest not found: ${absPath}`);
    text = await fs.readFile(absPath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ManifestError(absPath, `manifest not found: ${absPath}`);
    }
    throw err;
  }
  // Parts sit next to the real manifest, not next to a link to it.
  return parseManifest(text, await fs.realpath(absPath));
}

export function partPath(manifest: Manifest, fileName: string): string {
  return path.join(manifest.directory, fileName);
}
