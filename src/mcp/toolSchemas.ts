import * as z from "zod/v4";

export const zSha256Hex = z.string().regex(/^[a-f0-9]{64}$/);
export const zPolicyHash = z.string().regex(/^sha256:[a-f0-9]{64}$/);

export const zManifestSummary = z.object({
  manifest_path: z.string(),
  format: z.literal("img-split-v1"),
  original_file: z.string(),
  original_size: z.string().nullable(),
  original_sha256: zSha256Hex,
  part_prefix: z.string(),
  part_count: z.number().int().min(1)
});

export const zPartsVerifyInput = z.object({
  manifest_path: z.string().min(1)
});

export const zPartsVerifyOutput = z.object({
  policy_hash: zPolicyHash,
  manifest: zManifestSummary,
  ok: z.boolean(),
  parts: z.array(
    z.object({
      file: z.string(),
      status: z.enum(["ok", "missing"]),
      size_bytes: z.string().nullable()
    })
  ),
  missing: z.array(z.string())
});

export const zPartsJoinInput = z.object({
  manifest_path: z.string().min(1),
  output_path: z.string().min(1).optional()
});

export const zPartsJoinOutput = z.object({
  policy_hash: zPolicyHash,
  manifest: zManifestSummary,
  output_path: z.string(),
  sha256: zSha256Hex,
  size_bytes: z.string(),
  order: z.array(z.string()),
  warnings: z.array(z.string()),
  log: z.array(z.string())
});
