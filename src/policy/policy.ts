import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { DEFAULT_READ_BUFFER_BYTES, sha256Hex } from "../core/digest.js";
import { PolicyError } from "../core/errors.js";
import { DEFAULT_OUTPUT_NAME } from "../parts/reassemble.js";

const zPolicyConfig = z.object({
  version: z.literal(1),
  tool_allowlist: z.array(z.string()).default([]),
  defaults: z
    .object({
      output_name: z.string().min(1).optional()
    })
    .default({}),
  io: z
    .object({
      read_buffer_bytes: z
        .number()
        .int()
        .min(4096)
        .max(64 * 1024 * 1024)
        .optional()
    })
    .default({}),
  paths: z
    .object({
      manifest_prefix_allowlist: z.array(z.string()).default([]),
      output_prefix_allowlist: z.array(z.string()).default([]),
      deny_symlinks: z.boolean().optional()
    })
    .default({ manifest_prefix_allowlist: [], output_prefix_allowlist: [] })
});

export type PolicyConfig = z.output<typeof zPolicyConfig>;

export const DEFAULT_POLICY: PolicyConfig = {
  version: 1,
  tool_allowlist: [],
  defaults: {},
  io: {},
  paths: { manifest_prefix_allowlist: [], output_prefix_allowlist: [] }
};

function expandEnvToken(value: string, env: NodeJS.ProcessEnv): string | null {
  const trimmed = value.trim();
  const m = /^\$\{([A-Z0-9_]+)\}$/.exec(trimmed) ?? /^\$([A-Z0-9_]+)$/.exec(trimmed);
  if (!m) return value;
  const varName = m[1];
  if (!varName) return null;
  const v = env[varName]?.trim();
  return v ? v : null;
}

function expandPrefixes(prefixes: string[], env: NodeJS.ProcessEnv): string[] {
  return prefixes
    .map((p) => expandEnvToken(p, env))
    .filter((p): p is string => typeof p === "string" && p.trim().length > 0);
}

function expandPolicyEnv(policy: PolicyConfig, env: NodeJS.ProcessEnv): PolicyConfig {
  return {
    ...policy,
    paths: {
      ...policy.paths,
      manifest_prefix_allowlist: expandPrefixes(policy.paths.manifest_prefix_allowlist, env),
      output_prefix_allowlist: expandPrefixes(policy.paths.output_prefix_allowlist, env)
    }
  };
}

async function realpathOrSelf(p: string): Promise<string> {
  try {
    return await fs.realpath(p);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return p;
    throw err;
  }
}

async function isUnderAnyPrefix(real: string, prefixes: string[]): Promise<boolean> {
  const matches = await Promise.all(
    prefixes.map(async (prefix) => {
      const realPrefix = await realpathOrSelf(path.resolve(prefix));
      return real === realPrefix || real.startsWith(realPrefix + path.sep);
    })
  );
  return matches.some(Boolean);
}

export class PolicyEngine {
  readonly policyHash: `sha256:${string}`;

  constructor(private readonly policy: PolicyConfig) {
    this.policyHash = `sha256:${sha256Hex(JSON.stringify(policy))}`;
  }

  static fromConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env, source = "policy"): PolicyEngine {
    const parsed = zPolicyConfig.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length ? issue.path.map(String).join(".") : "(root)";
      throw new PolicyError(`invalid policy at ${source}: ${where}: ${issue?.message ?? "unknown error"}`);
    }
    return new PolicyEngine(expandPolicyEnv(parsed.data, env));
  }

  static async loadFromFile(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<PolicyEngine> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") throw new PolicyError(`policy file not found: ${filePath}`);
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw) as unknown;
    } catch (err) {
      throw new PolicyError(`invalid policy at ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return PolicyEngine.fromConfig(parsed, env, filePath);
  }

  defaultOutputName(): string {
    return this.policy.defaults.output_name ?? DEFAULT_OUTPUT_NAME;
  }

  readBufferBytes(): number {
    return this.policy.io.read_buffer_bytes ?? DEFAULT_READ_BUFFER_BYTES;
  }

  assertToolAllowed(toolName: string): void {
    if (!this.policy.tool_allowlist.includes(toolName)) {
      throw new PolicyError(`policy denied tool: ${toolName}`);
    }
  }

  /**
   * Resolves a manifest path for a gateway call; it must sit under one of
   * `paths.manifest_prefix_allowlist`.
   */
  async validateManifestPath(manifestPath: string): Promise<string> {
    const resolved = path.resolve(manifestPath);
    const real = await realpathOrSelf(resolved);

    const denySymlinks = this.policy.paths.deny_symlinks ?? true;
    if (denySymlinks && real !== resolved) {
      throw new PolicyError(`policy denied symlinked manifest path: ${resolved}`);
    }
    if (!(await isUnderAnyPrefix(real, this.policy.paths.manifest_prefix_allowlist))) {
      throw new PolicyError(`policy denied manifest_path outside allowlist: ${real}`);
    }
    return real;
  }

  /**
   * Called for each part before it is read. An absent part passes so the
   * checker can report it as missing.
   */
  async validatePartPath(directory: string, fileName: string): Promise<void> {
    const full = path.join(directory, fileName);
    let isLink: boolean;
    try {
      isLink = (await fs.lstat(full)).isSymbolicLink();
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return;
      throw err;
    }

    const denySymlinks = this.policy.paths.deny_symlinks ?? true;
    if (denySymlinks && isLink) {
      throw new PolicyError(`policy denied symlinked part: ${full}`);
    }
    const real = await realpathOrSelf(full);
    const realDir = await realpathOrSelf(directory);
    if (!real.startsWith(realDir + path.sep)) {
      throw new PolicyError(`policy denied part outside manifest directory: ${full}`);
    }
  }

  /**
   * Output files may not exist yet, so only the parent directory is resolved.
   */
  async validateOutputPath(outputPath: string): Promise<string> {
    const resolved = path.resolve(outputPath);
    const parent = await realpathOrSelf(path.dirname(resolved));
    const real = path.join(parent, path.basename(resolved));

    if (!(await isUnderAnyPrefix(real, this.policy.paths.output_prefix_allowlist))) {
      throw new PolicyError(`policy denied output_path outside allowlist: ${real}`);
    }

    const denySymlinks = this.policy.paths.deny_symlinks ?? true;
    if (denySymlinks) {
      try {
        const st = await fs.lstat(real);
        if (st.isSymbolicLink()) throw new PolicyError(`policy denied symlinked output_path: ${real}`);
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
      }
    }
    return real;
  }
}
