import { silentReporter, type Reporter } from "../core/reporter.js";
import { readManifest, type Manifest } from "../manifest/manifest.js";
import { verifyOutput } from "./finalVerify.js";
import { DEFAULT_OUTPUT_NAME, reassemble } from "./reassemble.js";
import { checkParts, verifyParts, type PartCheckReport, type PartGuard } from "./verifyParts.js";

export interface JoinRequest {
  manifestPath: string;
  outputPath?: string;
  reporter?: Reporter;
  readBufferBytes?: number;
  partGuard?: PartGuard;
}

export interface JoinResult {
  manifest: Manifest;
  outputPath: string;
  order: string[];
  sha256: string;
  sizeBytes: bigint;
  warnings: string[];
}

export interface InspectResult {
  manifest: Manifest;
  report: PartCheckReport;
}

export async function inspectParts(req: Omit<JoinRequest, "outputPath">): Promise<InspectResult> {
  const manifest = await readManifest(req.manifestPath);
  const report = await checkParts(manifest, {
    reporter: req.reporter,
    readBufferBytes: req.readBufferBytes,
    partGuard: req.partGuard
  });
  return { manifest, report };
}

export async function joinParts(req: JoinRequest): Promise<JoinResult> {
  const reporter = req.reporter ?? silentReporter;
  const outputPath = req.outputPath ?? DEFAULT_OUTPUT_NAME;
  const io = { readBufferBytes: req.readBufferBytes };

  const manifest = await readManifest(req.manifestPath);

  reporter.info("[*] Verifying parts...");
  await verifyParts(manifest, { ...io, reporter, partGuard: req.partGuard });

  reporter.info(`[*] Concatenating parts into ${outputPath} ...`);
  const assembled = await reassemble(manifest, outputPath, io);

  reporter.info("[*] Verifying final image checksum and size...");
  const checked = await verifyOutput(manifest, assembled.outputPath, io);

  const warnings: string[] = [];
  if (checked.sizeMismatch) {
    const { expected, actual } = checked.sizeMismatch;
    warnings.push(`size mismatch (manifest ${expected.toString()}, actual ${actual.toString()})`);
    reporter.warn("Warning: size mismatch");
    reporter.warn(` manifest: ${expected.toString()}`);
    reporter.warn(`   actual: ${actual.toString()}`);
  } else {
    reporter.info("[✓] Reassembled image verified.");
  }
  reporter.info(`Output image: ${checked.outputPath}`);

  return {
    manifest,
    outputPath: checked.outputPath,
    order: assembled.order,
    sha256: checked.sha256,
    sizeBytes: checked.sizeBytes,
    warnings
  };
}
