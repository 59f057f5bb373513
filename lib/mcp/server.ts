#!/usr/bin/env node
/**
 * MCP stdio server exposing the HPO mapping tools to agent clients.
 *
 * stdout carries the protocol, so console logging is redirected to stderr
 * before any logger is created.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";

import { errorMessage } from "../agents/errors";
import { loadEnvironment, loadPipelineConfig } from "../config/pipeline-config";
import { LogConfigManager } from "../logging/log-config";
import { WorkflowLogger } from "../logging/logging";
import { CandidateRetriever } from "../services/candidate-retriever";
import { createPipelineServices } from "../services/service-registry";
import { PhenotypeMappingOrchestrator } from "../workflow/workflow-orchestrator";
import { TOOL_DEFINITIONS, ToolContext, handleToolCall } from "./tools";

export const SERVER_INFO = { name: "hpo-phenotype-mapper", version: "0.1.0" };

export function createMcpServer(context: ToolContext): Server {
  const server = new Server(SERVER_INFO, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await handleToolCall(context, name, args);
    } catch (error) {
      context.logger.logError("mcp.callTool", `Tool ${name} failed`, { error: errorMessage(error) });
      return {
        content: [{ type: "text" as const, text: JSON.stringify({ error: errorMessage(error) }) }],
        isError: true,
      };
    }
  });

  return server;
}

export async function startServer(): Promise<void> {
  if (process.env.WORKFLOW_CONSOLE_OUTPUT !== "none") {
    process.env.WORKFLOW_CONSOLE_OUTPUT = "stderr";
  }
  LogConfigManager.resetConfig();
  loadEnvironment();

  const logger = new WorkflowLogger("mcp-server");
  const config = loadPipelineConfig();
  const services = await createPipelineServices(config, logger);
  const orchestrator = PhenotypeMappingOrchestrator.fromServices(services, config.mapping);

  const context: ToolContext = {
    retriever: new CandidateRetriever(services.ontologyIndex, logger),
    transform: (text, options) => orchestrator.transform(text, options),
    logger,
  };

  const server = createMcpServer(context);
  await server.connect(new StdioServerTransport());
  logger.logInfo("startServer", "MCP server listening on stdio", { tools: TOOL_DEFINITIONS.map((tool) => tool.name) });
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    console.error(`Failed to start MCP server: ${errorMessage(error)}`);
    process.exit(1);
  });
}
