import { describe, it, expect } from "vitest";
import { mkdtemp, mkdir, realpath, rm, symlink, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ManifestError } from "../src/core/errors.js";
import { parseManifest, readManifest } from "../src/manifest/manifest.js";
import { manifestText } from "./fixtures.js";

const SHA_A = "a".repeat(64);
const SHA_B = "b".repeat(64);
const SHA_F = "f".repeat(64);
const MANIFEST_PATH = "/data/disk_parts/disk.manifest.txt";

describe("parseManifest", () => {
  it("parses scalar fields and the part list", () => {
    const text = manifestText({
      originalFile: "disk.img",
      originalSize: "1024",
      originalSha256: SHA_F,
      partPrefix: "disk.img.part",
      parts: [
        ["disk.img.part01", SHA_A],
        ["disk.img.part02", SHA_B]
      ]
    });
    const m = parseManifest(text, MANIFEST_PATH);
    expect(m).toEqual({
      format: "img-split-v1",
      manifestPath: MANIFEST_PATH,
      directory: "/data/disk_parts",
      originalFileName: "disk.img",
      originalSize: 1024n,
      originalDigest: SHA_F,
      partPrefix: "disk.img.part",
      parts: [
        { fileName: "disk.img.part01", sha256: SHA_A },
        { fileName: "disk.img.part02", sha256: SHA_B }
      ]
    });
  });

  it("keeps everything after the first '=' and lets the first matching line win", () => {
    const text = [
      "FORMAT=img-split-v1",
      "ORIGINAL_FILE=a=b.img",
      "ORIGINAL_FILE=ignored.img",
      `ORIGINAL_SHA256=${SHA_F}`,
      "PARTS_BEGIN",
      `p1 ${SHA_A}`,
      "PARTS_END"
    ].join("\n");
    const m = parseManifest(text, MANIFEST_PATH);
    expect(m.originalFileName).toBe("a=b.img");
    expect(m.partPrefix).toBe("");
    expect(m.originalSize).toBeNull();
  });

  it("ignores part-looking lines outside the markers and blank lines inside", () => {
    const text = [
      "FORMAT=img-split-v1",
      `ORIGINAL_SHA256=${SHA_F}`,
      `stray ${SHA_B}`,
      "PARTS_BEGIN",
      "",
      `p1   ${SHA_A}`,
      "   ",
      "PARTS_END",
      `after ${SHA_B}`
    ].join("\n");
    expect(parseManifest(text, MANIFEST_PATH).parts).toEqual([{ fileName: "p1", sha256: SHA_A }]);
  });

  it("accepts CRLF line endings and uppercase digests", () => {
    const text = ["FORMAT=img-split-v1", `ORIGINAL_SHA256=${SHA_F.toUpperCase()}`, "PARTS_BEGIN", `p1 ${SHA_A.toUpperCase()}`, "PARTS_END"].join(
      "\r\n"
    );
    const m = parseManifest(text, MANIFEST_PATH);
    expect(m.originalDigest).toBe(SHA_F);
    expect(m.parts).toEqual([{ fileName: "p1", sha256: SHA_A }]);
  });

  it("treats an empty ORIGINAL_SIZE as absent", () => {
    const text = manifestText({ originalSize: "", originalSha256: SHA_F, parts: [["p1", SHA_A]] });
    expect(parseManifest(text, MANIFEST_PATH).originalSize).toBeNull();
  });

  it("rejects an unsupported or missing format before anything else", () => {
    const other = manifestText({ format: "other-v2", originalSha256: "nope", parts: [] });
    expect(() => parseManifest(other, MANIFEST_PATH)).toThrow(ManifestError);
    expect(() => parseManifest(other, MANIFEST_PATH)).toThrow("unsupported manifest format: other-v2");

    expect(() => parseManifest(`ORIGINAL_SHA256=${SHA_F}\n`, MANIFEST_PATH)).toThrow(
      "unsupported manifest format: (missing)"
    );
  });

  it("rejects an empty part list", () => {
    const text = manifestText({ originalSha256: SHA_F, parts: [] });
    expect(() => parseManifest(text, MANIFEST_PATH)).toThrow("no parts listed in manifest");
  });

  it("rejects a missing or malformed ORIGINAL_SHA256", () => {
    const missing = ["FORMAT=img-split-v1", "PARTS_BEGIN", `p1 ${SHA_A}`, "PARTS_END"].join("\n");
    expect(() => parseManifest(missing, MANIFEST_PATH)).toThrow("invalid ORIGINAL_SHA256: expected 64 hex characters");

    const short = manifestText({ originalSha256: "abc123", parts: [["p1", SHA_A]] });
    expect(() => parseManifest(short, MANIFEST_PATH)).toThrow("invalid ORIGINAL_SHA256");
  });

  it("rejects a non-numeric ORIGINAL_SIZE", () => {
    for (const size of ["12x", "1.5", "-5"]) {
      const text = manifestText({ originalSize: size, originalSha256: SHA_F, parts: [["p1", SHA_A]] });
      expect(() => parseManifest(text, MANIFEST_PATH)).toThrow(ManifestError);
      expect(() => parseManifest(text, MANIFEST_PATH)).toThrow("invalid ORIGINAL_SIZE: expected a non-negative integer");
    }
  });

  it("names the line of a part entry without exactly two tokens", () => {
    // Lines: FORMAT, ORIGINAL_FILE, ORIGINAL_SIZE, ORIGINAL_SHA256, PART_PREFIX, PARTS_BEGIN, then parts.
    const text = manifestText({ originalSize: "3", originalSha256: SHA_F, parts: [["p1", `${SHA_A} extra`]] });
    expect(() => parseManifest(text, MANIFEST_PATH)).toThrow(/^malformed part line 7: /);

    const lonely = manifestText({ originalSize: "3", originalSha256: SHA_F, parts: [["p1", ""]] });
    expect(() => parseManifest(lonely, MANIFEST_PATH)).toThrow(/^malformed part line 7: /);
  });

  it("rejects bad part digests and names that escape the manifest directory", () => {
    const badSha = manifestText({ originalSize: "3", originalSha256: SHA_F, parts: [["p1", "xyz"]] });
    expect(() => parseManifest(badSha, MANIFEST_PATH)).toThrow("invalid part sha256 at line 7: expected 64 hex characters");

    const escape = manifestText({ originalSize: "3", originalSha256: SHA_F, parts: [["../p1", SHA_A]] });
    expect(() => parseManifest(escape, MANIFEST_PATH)).toThrow(
      "invalid part fileName at line 7: part names may not contain '..'"
    );

    const absolute = manifestText({ originalSize: "3", originalSha256: SHA_F, parts: [["/etc/p1", SHA_A]] });
    expect(() => parseManifest(absolute, MANIFEST_PATH)).toThrow("absolute part names are not allowed");
  });
});

describe("readManifest", () => {
  it("fails with 'manifest not found' for a missing path or a directory", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chunkjoin-manifest-"));
    try {
      const missing = path.join(dir, "nope.manifest.txt");
      await expect(readManifest(missing)).rejects.toThrow(`manifest not found: ${missing}`);

      const sub = path.join(dir, "sub");
      await mkdir(sub);
      await expect(readManifest(sub)).rejects.toBeInstanceOf(ManifestError);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("resolves parts next to the target of a symlinked manifest", async () => {
    const dir = await realpath(await mkdtemp(path.join(os.tmpdir(), "chunkjoin-manifest-")));
    try {
      const dataDir = path.join(dir, "data");
      const otherDir = path.join(dir, "other");
      await mkdir(dataDir);
      await mkdir(otherDir);
      const target = path.join(dataDir, "disk.manifest.txt");
      await writeFile(target, manifestText({ originalSha256: SHA_F, parts: [["p1", SHA_A]] }));
      const link = path.join(otherDir, "m.txt");
      await symlink(target, link);

      const manifest = await readManifest(link);
      expect(manifest.manifestPath).toBe(target);
      expect(manifest.directory).toBe(dataDir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
