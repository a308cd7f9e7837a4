/**
 * Comment catalog MCP Server with Streamable HTTP Transport
 *
 * Exposes the extended comment catalog to MCP clients: status, DDL preview,
 * comment reads and writes, and the export/import synchronisation paths.
 *
 * Run modes:
 *   npm start            - No auth (local development)
 *   npm run start:auth   - Require MCP_AUTH_TOKEN as a Bearer token
 */

import { randomUUID, timingSafeEqual } from 'node:crypto';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { z } from 'zod';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import { testConnection, closePool } from './database/client.js';
import { getConfig } from './config.js';
import { OBJECT_KINDS } from './catalog/kinds.js';

import {
  executeCatalogStatusTool,
  executePreviewDdlTool,
  executeGetCommentTool,
  executeSetCommentTool,
  executeExportCommentsTool,
  executeImportCommentsTool,
  executeCopyRoutineCommentsTool,
  executeInstallOverlayTool,
  executeUninstallOverlayTool,
} from './tools/index.js';

const SERVER_NAME = 'doccat-mcp';
const SERVER_VERSION = '1.0.0';

// Check for auth flag
const useAuth = process.argv.includes('--auth');

// Session management
const transports: Record<string, StreamableHTTPServerTransport> = {};

const kindNames = OBJECT_KINDS.map(kind => kind.table);
const relationArg = z
  .string()
  .min(1)
  .describe(`Catalog relation, one of: ${kindNames.join(', ')}`);
const keyArg = z
  .record(z.union([z.string(), z.number().int()]))
  .describe('Primary key of the object, by column name (e.g. {"tabschema": "app", "tabname": "orders"})');

/**
 * Timing-safe token comparison
 */
function safeCompareTokens(provided: string, expected: string): boolean {
  if (!provided || !expected) return false;

  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);

  if (providedBuf.length !== expectedBuf.length) {
    const paddedProvided = Buffer.alloc(expectedBuf.length);
    providedBuf.copy(paddedProvided);
    timingSafeEqual(paddedProvided, expectedBuf);
    return false;
  }

  return timingSafeEqual(providedBuf, expectedBuf);
}

/**
 * Create and configure the MCP server with all tools
 */
function createMcpServer(enableAdminTools: boolean): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  server.tool(
    'catalog_status',
    'Show the configured namespaces and, for every native catalog relation, whether the overlay exposes it as a merge view or an alias and whether an extended table exists.',
    {},
    async () => {
      return executeCatalogStatusTool({});
    }
  );

  server.tool(
    'preview_ddl',
    'Show the CREATE VIEW / trigger DDL the overlay would generate for one catalog relation, without executing it.',
    {
      relation: relationArg,
    },
    async (args) => {
      return executePreviewDdlTool({ relation: args.relation });
    }
  );

  server.tool(
    'get_comment',
    'Read the effective comment of one catalog object, with the extended and native values it is merged from.',
    {
      relation: relationArg,
      key: keyArg,
    },
    async (args) => {
      return executeGetCommentTool({ relation: args.relation, key: args.key });
    }
  );

  server.tool(
    'set_comment',
    'Write an extended (long-form) comment for one catalog object. An empty string or null removes the extended comment so the native one applies again.',
    {
      relation: relationArg,
      key: keyArg,
      comment: z.string().nullable().describe('New comment text, or null / "" to clear'),
    },
    async (args) => {
      return executeSetCommentTool({ relation: args.relation, key: args.key, comment: args.comment });
    }
  );

  server.tool(
    'export_comments',
    'Generate native COMMENT ON statements for every extended comment, truncating to the native limit. With apply=true the statements are executed.',
    {
      apply: z.boolean().default(false).describe('Execute the statements instead of only listing them'),
    },
    async (args) => {
      return executeExportCommentsTool({ apply: args.apply });
    }
  );

  server.tool(
    'import_comments',
    'Replace every extended comment with the native catalog\'s comments. Destructive: requires confirm=true.',
    {
      confirm: z.boolean().default(false).describe('Must be true to run the import'),
    },
    async (args) => {
      return executeImportCommentsTool({ confirm: args.confirm });
    }
  );

  server.tool(
    'copy_routine_comments',
    'Copy the extended comments of one routine overload (and its parameters) onto another overload in the same schema.',
    {
      schema: z.string().min(1).describe('Routine schema'),
      from_specific_name: z.string().min(1).describe('Specific name of the documented overload'),
      to_specific_name: z.string().min(1).describe('Specific name of the overload to receive the comments'),
    },
    async (args) => {
      return executeCopyRoutineCommentsTool({
        schema: args.schema,
        from_specific_name: args.from_specific_name,
        to_specific_name: args.to_specific_name,
      });
    }
  );

  if (enableAdminTools) {
    server.tool(
      'install_overlay',
      'Create the merge namespace: a merge view with write-through trigger for every relation with an extended table, an alias for the rest.',
      {
        provision: z.boolean().default(false).describe('Create missing extended tables first'),
      },
      async (args) => {
        return executeInstallOverlayTool({ provision: args.provision });
      }
    );

    server.tool(
      'uninstall_overlay',
      'Drop every overlay object and both overlay namespaces. Stops if a foreign object lives in either namespace.',
      {},
      async () => {
        return executeUninstallOverlayTool({});
      }
    );
  }

  return server;
}

/**
 * Bearer token middleware
 */
function createAuthMiddleware(expectedToken: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({
        error: 'unauthorized',
        error_description: 'Bearer token required',
      });
      return;
    }

    if (!safeCompareTokens(authHeader.substring(7), expectedToken)) {
      res.status(401).json({
        error: 'invalid_token',
        error_description: 'Invalid token',
      });
      return;
    }

    next();
  };
}

/**
 * Start the MCP server with Streamable HTTP transport
 */
export async function startServer(): Promise<void> {
  const config = getConfig();

  // Test database connection
  console.log('Testing database connection...');
  const connected = await testConnection();

  if (!connected) {
    console.error('Failed to connect to database. Check DATABASE_URL.');
    process.exit(1);
  }
  console.log('Database connection successful.');

  if (useAuth && !config.mcpAuthToken) {
    console.error('--auth requires MCP_AUTH_TOKEN to be set.');
    process.exit(1);
  }

  // Create Express app
  const app = express();

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Last-Event-Id'],
    exposedHeaders: ['Mcp-Session-Id'],
  }));
  app.use(express.json());

  const authMiddleware = useAuth && config.mcpAuthToken ? createAuthMiddleware(config.mcpAuthToken) : null;

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', server: SERVER_NAME, version: SERVER_VERSION });
  });

  // MCP POST handler - Initialize sessions and handle requests
  const mcpPostHandler = async (req: Request, res: Response) => {
    try {
      const sessionId = req.header('mcp-session-id');
      const existing = sessionId ? transports[sessionId] : undefined;

      if (existing) {
        await existing.handleRequest(req, res, req.body);
        return;
      }

      if (sessionId || !isInitializeRequest(req.body)) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID' },
          id: null,
        });
        return;
      }

      const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid) => {
          console.log(`Session initialized: ${sid}`);
          transports[sid] = transport;
        },
      });

      transport.onclose = () => {
        const sid = transport.sessionId;
        if (sid && transports[sid]) {
          console.log(`Session closed: ${sid}`);
          delete transports[sid];
        }
      };

      const server = createMcpServer(config.enableAdminTools);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  };

  // MCP GET (SSE streams) and DELETE (session termination) handler
  const mcpSessionHandler = async (req: Request, res: Response) => {
    const sessionId = req.header('mcp-session-id');
    const transport = sessionId ? transports[sessionId] : undefined;

    if (!transport) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      console.error('Error handling MCP session request:', error);
      if (!res.headersSent) {
        res.status(500).send('Internal server error');
      }
    }
  };

  // Register routes with conditional auth
  if (authMiddleware) {
    app.post('/mcp', authMiddleware, mcpPostHandler);
    app.get('/mcp', authMiddleware, mcpSessionHandler);
    app.delete('/mcp', authMiddleware, mcpSessionHandler);
  } else {
    app.post('/mcp', mcpPostHandler);
    app.get('/mcp', mcpSessionHandler);
    app.delete('/mcp', mcpSessionHandler);
  }

  const httpServer = app.listen(config.mcpPort, () => {
    console.log(`\n${SERVER_NAME} v${SERVER_VERSION} running on port ${config.mcpPort}`);
    console.log(`  MCP endpoint: http://localhost:${config.mcpPort}/mcp`);
    console.log(`  Health check: http://localhost:${config.mcpPort}/health`);
    console.log(`  Auth: ${authMiddleware ? 'bearer token' : 'disabled (use --auth flag to enable)'}`);
    console.log(`  Admin tools: ${config.enableAdminTools ? 'enabled' : 'disabled'}`);
    console.log('');
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('\nShutting down...');

    for (const [sessionId, transport] of Object.entries(transports)) {
      try {
        await transport.close();
        delete transports[sessionId];
      } catch (error) {
        console.error(`Error closing session ${sessionId}:`, error);
      }
    }

    await closePool();

    httpServer.close(() => {
      console.log('Server shutdown complete.');
      process.exit(0);
    });
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error('Error during shutdown:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
