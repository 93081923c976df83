/**
 * Netlist MCP Server
 *
 * Model Context Protocol server for querying JSON netlists.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { VERSION } from "./version.js";
import {
  listDesigns,
  listModules,
  queryModule,
  queryCell,
  searchWires,
} from "./service.js";

// =============================================================================
// Server Instructions
// =============================================================================

const SERVER_INSTRUCTIONS = `
# JSON Netlist MCP Server

This server reads JSON netlists (modules with ports, netnames and cells whose bits
are constants or shared integer signal ids) and answers questions about them.

## Workflow Guidance

1. Use \`list_designs\` first to find netlist files in a directory
2. Use \`list_modules\` to see the modules of a design
3. Use \`query_module\` for a module's ports, wires, cells and connections
4. Use \`query_cell\` to inspect one cell, \`search_wires\` to find wires by regex

## Tool Usage Tips

- Bits are rendered as \`wire[i]\`, or \`wire\` for 1-bit wires; constants as 0, 1, x, z
- Wires named \`$auto$json$N\` were created for cell connections not named by any net
- Connections are listed as [driven bit, driver]
- All design paths should be absolute paths

## Error Handling

Results with an \`error\` field indicate a problem:
- Parse errors name the line and column
- Schema errors name the module, port, net or cell and the bit index
- Module not found: the error lists the available modules
`.trim();

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Format a result as MCP tool response content.
 */
const formatResult = (
  result: unknown,
): { content: { type: "text"; text: string }[] } => ({
  content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
});

// =============================================================================
// Server Setup
// =============================================================================

/**
 * Create and configure the MCP server.
 */
export const createServer = (): McpServer => {
  const server = new McpServer(
    {
      name: "json-netlist-mcp-server",
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  // -------------------------------------------------------------------------
  // Tool: list_designs
  // -------------------------------------------------------------------------
  server.registerTool(
    "list_designs",
    {
      description: "List all JSON netlists in the given directory",
      inputSchema: {
        path: z
          .string()
          .optional()
          .describe("Absolute path to directory to search for designs"),
        pattern: z
          .string()
          .optional()
          .describe("Regex pattern to filter design names"),
      },
    },
    async ({ path, pattern }) => {
      const result = await listDesigns(path, pattern);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: list_modules
  // -------------------------------------------------------------------------
  server.registerTool(
    "list_modules",
    {
      description: "List the modules of a design with port, wire and cell counts",
      inputSchema: {
        design: z.string().describe("Absolute path to JSON netlist file"),
      },
    },
    async ({ design }) => {
      const result = await listModules(design);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_module
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_module",
    {
      description: "Get a module's ports, wires, cells and bit connections",
      inputSchema: {
        design: z.string().describe("Absolute path to JSON netlist file"),
        module: z.string().describe("Module name as written in the netlist"),
      },
    },
    async ({ design, module }) => {
      const result = await queryModule(design, module);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: query_cell
  // -------------------------------------------------------------------------
  server.registerTool(
    "query_cell",
    {
      description: "Get a cell's type and port connections",
      inputSchema: {
        design: z.string().describe("Absolute path to JSON netlist file"),
        module: z.string().describe("Module name"),
        cell: z.string().describe("Cell instance name"),
      },
    },
    async ({ design, module, cell }) => {
      const result = await queryCell(design, module, cell);
      return formatResult(result);
    },
  );

  // -------------------------------------------------------------------------
  // Tool: search_wires
  // -------------------------------------------------------------------------
  server.registerTool(
    "search_wires",
    {
      description: "Search for wires matching a regex pattern in every module",
      inputSchema: {
        pattern: z.string().describe("Regex pattern"),
        design: z.string().describe("Absolute path to JSON netlist file"),
      },
    },
    async ({ pattern, design }) => {
      const result = await searchWires(pattern, design);
      return formatResult(result);
    },
  );

  return server;
};

/**
 * Run the MCP server with stdio transport.
 */
export const runServer = async (): Promise<void> => {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
};
