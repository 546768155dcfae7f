import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { PolicyEngine } from "./policy/policy.js";

async function main(): Promise<void> {
  const policyPath = process.env.CHUNKJOIN_POLICY_PATH ?? "policies/default.policy.yaml";

  const policy = await PolicyEngine.loadFromFile(policyPath);
  const server = createGatewayServer({ policy });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("chunkjoin gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
