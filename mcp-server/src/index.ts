/**
 * minipy MCP Server
 *
 * Provides validation, parsing, execution and reference resources for
 * minipy via the Model Context Protocol.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import {
  findProjectRoot,
  grammarPath,
  handleExecute,
  handleParse,
  handleValidate,
  listExamples,
  readResource,
  toolResult,
} from "./tools";

const server = new McpServer({
  name: "minipy",
  version: "0.1.0",
});

// -- Register tools -----------------------------------------------------------

// Tool: minipy_validate
server.registerTool(
  "minipy_validate",
  {
    description:
      "Validate minipy source code. Returns syntax errors and lint diagnostics (errors and warnings) with line/column locations.",
    inputSchema: { code: z.string() },
  },
  async (args) => toolResult(handleValidate(args)),
);

// Tool: minipy_parse
server.registerTool(
  "minipy_parse",
  {
    description: "Parse minipy source code and return the program AST as JSON.",
    inputSchema: { code: z.string() },
  },
  async (args) => toolResult(handleParse(args)),
);

// Tool: minipy_execute
server.registerTool(
  "minipy_execute",
  {
    description:
      "Execute minipy source code and return the captured print output, " +
      "plus the error message when the program fails.",
    inputSchema: {
      code: z.string().describe("minipy source code to execute"),
      callScope: z
        .enum(["parameters", "caller"])
        .optional()
        .describe('Variables visible in a called function: "parameters" (default) or a copy of the caller\'s'),
      eagerOr: z.boolean().optional().describe("Evaluate both operands of 'or'"),
    },
  },
  async (args) => toolResult(handleExecute(args)),
);

// -- Register resources -------------------------------------------------------

const projectRoot = findProjectRoot();

// Resource: minipy://grammar
server.registerResource(
  "grammar",
  "minipy://grammar",
  {
    description: "EBNF grammar of the minipy language.",
    mimeType: "text/plain",
  },
  async (uri) => ({
    contents: [{ uri: uri.href, text: readResource(grammarPath(projectRoot), projectRoot), mimeType: "text/plain" }],
  }),
);

// Example file resources: minipy://examples/{name}
for (const example of listExamples(projectRoot)) {
  server.registerResource(
    `example-${example.name}`,
    `minipy://examples/${example.name}`,
    {
      description: `minipy example program: ${example.name.replace(/-/g, " ")}`,
      mimeType: "text/plain",
    },
    async (uri) => ({
      contents: [{ uri: uri.href, text: readResource(example.path, projectRoot), mimeType: "text/plain" }],
    }),
  );
}

// -- start --------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error starting minipy MCP server:", err);
  process.exit(1);
});
