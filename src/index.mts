#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ErrorCode,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { IndicatorRunError, runIndicatorPipeline } from './services/pipeline.js';
import { IndicatorPublisher, PublishError } from './services/publisher.js';
import { formatRunDigest, summarizeRun } from './services/summaries.js';
import { INDICATOR_NAMES, indicatorJsonSchema } from './schemas/indicators.js';
import { getConfig, assertRequiredConfig } from './config.js';
import { logger } from './logger.js';

const config = getConfig();
assertRequiredConfig(config);

const publisher = new IndicatorPublisher(config.indicatorsDir);

const IndicatorArgsSchema = z.object({ name: z.enum(INDICATOR_NAMES) });

const server = new Server(
  {
    name: 'sector-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

process.on('SIGINT', async () => {
  logger.info('SIGINT received, closing server');
  await server.close();
  process.exit(0);
});

const indicatorNameInput = {
  type: 'object',
  properties: {
    name: {
      type: 'string',
      enum: [...INDICATOR_NAMES],
      description: 'Indicator artifact to load.',
    },
  },
  required: ['name'],
} as const;

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: 'build_indicators',
      description: 'Rebuild every sector and national indicator from the current article store and publish them.',
      inputSchema: { type: 'object', properties: {} },
    },
    {
      name: 'get_indicator',
      description: 'Load the latest published indicator artifact.',
      inputSchema: indicatorNameInput,
    },
    {
      name: 'describe_indicator',
      description: 'JSON Schema of a published indicator artifact.',
      inputSchema: indicatorNameInput,
    },
  ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  try {
    switch (request.params.name) {
      case 'build_indicators': {
        const result = await runIndicatorPipeline({ config, publisher });
        const summary = summarizeRun(result);
        return {
          content: [{ type: 'text', text: formatRunDigest(summary, result.indicators) }],
          structuredContent: summary,
        };
      }
      case 'get_indicator': {
        const { name } = parseIndicatorArgs(request.params.arguments);
        const published = await publisher.read(name);
        if (!published) {
          return {
            content: [{ type: 'text', text: `Not enough data yet: "${name}" has not been published.` }],
          };
        }
        return {
          content: [{ type: 'text', text: JSON.stringify(published.document, null, 2) }],
        };
      }
      case 'describe_indicator': {
        const { name } = parseIndicatorArgs(request.params.arguments);
        return {
          content: [{ type: 'text', text: JSON.stringify(indicatorJsonSchema(name), null, 2) }],
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${request.params.name}`);
    }
  } catch (error: unknown) {
    if (error instanceof McpError) {
      throw error;
    }
    if (error instanceof IndicatorRunError) {
      throw new McpError(error.code, error.message, error.details);
    }
    if (error instanceof PublishError) {
      throw new McpError(ErrorCode.InternalError, error.message, error.details);
    }
    logger.error({ err: error }, 'Unexpected tool invocation failure');
    throw new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
  }
});

function parseIndicatorArgs(args: unknown) {
  const parsed = IndicatorArgsSchema.safeParse(args);
  if (!parsed.success) {
    throw new McpError(ErrorCode.InvalidParams, `Provide an indicator name: ${INDICATOR_NAMES.join(', ')}.`);
  }
  return parsed.data;
}

async function start() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ transport: 'stdio', indicatorsDir: config.indicatorsDir }, 'Sector Pulse server listening');
}

start().catch((error) => {
  logger.error({ err: error }, 'Failed to start Sector Pulse server');
  process.exit(1);
});
