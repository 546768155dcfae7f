import { ChunkJoinError, UsageError } from "../core/errors.js";
import { streamReporter } from "../core/reporter.js";
import { inspectParts, joinParts } from "../parts/join.js";
import { DEFAULT_POLICY, PolicyEngine } from "../policy/policy.js";

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
}

export interface CliArgs {
  manifestPath: string | null;
  outputPath: string | null;
  verifyOnly: boolean;
  policyPath: string | null;
  help: boolean;
}

export function usage(program = "chunkjoin"): string {
  return [
    "usage:",
    `  ${program} <manifest-path> [output-path] [--verify-only] [--policy <file>]`,
    "",
    "notes:",
    "  - parts are resolved relative to the manifest's directory",
    "  - output defaults to ./reassembled.img (or defaults.output_name from the policy)",
    "  - --verify-only checks parts and writes nothing, so it takes no output-path",
    "",
    "env:",
    "  CHUNKJOIN_POLICY_PATH (optional, same as --policy)",
    ""
  ].join("\n");
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { manifestPath: null, outputPath: null, verifyOnly: false, policyPath: null, help: false };
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === undefined) continue;
    if (!a.startsWith("--")) {
      positional.push(a);
      continue;
    }
    const key = a.slice(2);
    if (key === "help") {
      out.help = true;
      continue;
    }
    if (key === "verify-only") {
      out.verifyOnly = true;
      continue;
    }
    if (key === "policy") {
      const next = argv[i + 1];
      if (!next || next.startsWith("--")) throw new UsageError(`missing value for --${key}`);
      out.policyPath = next;
      i++;
      continue;
    }
    throw new UsageError(`unexpected arg: ${a}`);
  }
  if (positional.length > 2) throw new UsageError(`unexpected arg: ${positional[2] ?? ""}`);
  out.manifestPath = positional[0] ?? null;
  out.outputPath = positional[1] ?? null;
  if (out.verifyOnly && out.outputPath !== null) {
    throw new UsageError(`--verify-only takes no output path (got ${out.outputPath})`);
  }
  return out;
}

function isNodeIoError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && typeof (err as NodeJS.ErrnoException).code === "string";
}

async function loadPolicy(args: CliArgs, env: NodeJS.ProcessEnv): Promise<PolicyEngine> {
  const policyPath = args.policyPath ?? env.CHUNKJOIN_POLICY_PATH ?? null;
  if (!policyPath) return new PolicyEngine(DEFAULT_POLICY);
  return PolicyEngine.loadFromFile(policyPath, env);
}

async function run(args: CliArgs, io: CliIo): Promise<number> {
  if (args.help) {
    io.stdout.write(usage());
    return 0;
  }
  const manifestPath = args.manifestPath;
  if (!manifestPath) throw new UsageError(`manifest path is required\n\n${usage()}`);

  const policy = await loadPolicy(args, io.env);
  const reporter = streamReporter(io.stdout);
  const readBufferBytes = policy.readBufferBytes();

  if (args.verifyOnly) {
    const { report } = await inspectParts({ manifestPath, reporter, readBufferBytes });
    if (report.missing.length) {
      io.stderr.write(`Error: missing parts (${report.missing.length}). Aborting.\n`);
      return 1;
    }
    io.stdout.write("ok\n");
    return 0;
  }

  await joinParts({
    manifestPath,
    outputPath: args.outputPath ?? policy.defaultOutputName(),
    reporter,
    readBufferBytes
  });
  return 0;
}

/**
 * Returns the process exit code. Status lines go to stdout; usage and fatal
 * errors go to stderr.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  try {
    return await run(parseArgs(argv), io);
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr.write(err.message.endsWith("\n") ? err.message : `${err.message}\n\n${usage()}`);
      return 1;
    }
    if (err instanceof ChunkJoinError || isNodeIoError(err)) {
      io.stderr.write(`Error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
