#!/usr/bin/env node
// Halyard MCP server — stdio entry point, installable in any MCP host.

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { HalyardEngine, ProviderRegistry, createOpenAIExplainer } from '@halyard/core';
import { createMcpServer } from './server.js';

const engine = new HalyardEngine({ explainer: createOpenAIExplainer(process.env) });
const registry = new ProviderRegistry({
  configPath: process.env['PROVIDER_REGISTRY_CONFIG'] || 'config/provider-registry.json',
});

const server = createMcpServer(engine, registry);
const transport = new StdioServerTransport();
await server.connect(transport);
