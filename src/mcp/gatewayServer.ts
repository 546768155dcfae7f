import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import path from "path";
import { ChunkJoinError } from "../core/errors.js";
import { bufferReporter } from "../core/reporter.js";
import type { Manifest } from "../manifest/manifest.js";
import { inspectParts, joinParts } from "../parts/join.js";
import type { PolicyEngine } from "../policy/policy.js";
import { zPartsJoinInput, zPartsJoinOutput, zPartsVerifyInput, zPartsVerifyOutput } from "./toolSchemas.js";

export interface GatewayDeps {
  policy: PolicyEngine;
}

function toManifestSummary(m: Manifest): Record<string, unknown> {
  return {
    manifest_path: m.manifestPath,
    format: m.format,
    original_file: m.originalFileName,
    original_size: m.originalSize === null ? null : m.originalSize.toString(),
    original_sha256: m.originalDigest,
    part_prefix: m.partPrefix,
    part_count: m.parts.length
  };
}

// Known failures become tool errors; anything else (bugs, unexpected I/O) propagates.
function toolError(toolName: string, err: unknown): CallToolResult {
  if (!(err instanceof ChunkJoinError) && !isNodeIoError(err)) throw err;
  const message = err instanceof Error ? err.message : String(err);
  return { isError: true, content: [{ type: "text", text: `${toolName} failed: ${message}` }] };
}

function isNodeIoError(err: unknown): boolean {
  return err instanceof Error && typeof (err as NodeJS.ErrnoException).code === "string";
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const partGuard = (directory: string, fileName: string) => deps.policy.validatePartPath(directory, fileName);

  const mcp = new McpServer({
    name: "chunkjoin-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "parts_verify",
    {
      description: "Check every part listed in an img-split-v1 manifest against its sha256 (policy-gated).",
      inputSchema: zPartsVerifyInput,
      outputSchema: zPartsVerifyOutput
    },
    async (args): Promise<CallToolResult> => {
      const toolName = "parts_verify";
      try {
        deps.policy.assertToolAllowed(toolName);
        const manifestPath = await deps.policy.validateManifestPath(args.manifest_path);
        const { manifest, report } = await inspectParts({
          manifestPath,
          readBufferBytes: deps.policy.readBufferBytes(),
          partGuard
        });

        const sizes = new Map(report.verified.map((p): [string, string] => [p.fileName, p.sizeBytes.toString()]));
        const missing = new Set(report.missing);
        const structured = {
          policy_hash: deps.policy.policyHash,
          manifest: toManifestSummary(manifest),
          ok: report.missing.length === 0,
          parts: manifest.parts.map((p) => ({
            file: p.fileName,
            status: missing.has(p.fileName) ? "missing" : "ok",
            size_bytes: sizes.get(p.fileName) ?? null
          })),
          missing: report.missing
        };
        const summary = structured.ok
          ? `All ${manifest.parts.length} parts verified`
          : `Missing ${report.missing.length} of ${manifest.parts.length} parts: ${report.missing.join(", ")}`;
        return { content: [{ type: "text", text: summary }], structuredContent: structured };
      } catch (err) {
        return toolError(toolName, err);
      }
    }
  );

  mcp.registerTool(
    "parts_join",
    {
      description: "Verify, concatenate in natural filename order and check the final sha256 (policy-gated).",
      inputSchema: zPartsJoinInput,
      outputSchema: zPartsJoinOutput
    },
    async (args): Promise<CallToolResult> => {
      const toolName = "parts_join";
      try {
        deps.policy.assertToolAllowed(toolName);
        const manifestPath = await deps.policy.validateManifestPath(args.manifest_path);
        const outputPath = await deps.policy.validateOutputPath(
          args.output_path ?? path.resolve(deps.policy.defaultOutputName())
        );

        const reporter = bufferReporter();
        const res = await joinParts({
          manifestPath,
          outputPath,
          reporter,
          readBufferBytes: deps.policy.readBufferBytes(),
          partGuard
        });

        const structured = {
          policy_hash: deps.policy.policyHash,
          manifest: toManifestSummary(res.manifest),
          output_path: res.outputPath,
          sha256: res.sha256,
          size_bytes: res.sizeBytes.toString(),
          order: res.order,
          warnings: res.warnings,
          log: reporter.lines
        };
        return {
          content: [{ type: "text", text: `Reassembled ${res.order.length} parts into ${res.outputPath}` }],
          structuredContent: structured
        };
      } catch (err) {
        return toolError(toolName, err);
      }
    }
  );

  return mcp;
}
