import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './logger';

export interface HttpApp {
  app: Express;
  closeSessions(): Promise<void>;
}

function jsonRpcError(res: Response, status: number, message: string): void {
  res.status(status).json({ jsonrpc: '2.0', error: { code: -32000, message }, id: null });
}

/**
 * Express app serving MCP over Streamable HTTP at /mcp. Every client session
 * gets its own McpServer from `createServer`; sessions are keyed by the
 * mcp-session-id header.
 */
export function createHttpApp(createServer: () => McpServer): HttpApp {
  const app = express();
  const transports = new Map<string, StreamableHTTPServerTransport>();

  // Middleware
  app.use(cors({ exposedHeaders: ['mcp-session-id'] }));
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  // POST /mcp - Client-to-server messages; an initialize request opens a session
  app.post('/mcp', async (req: Request, res: Response) => {
    try {
      const sessionId = req.header('mcp-session-id');
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport) {
        if (sessionId || !isInitializeRequest(req.body)) {
          return jsonRpcError(res, 400, 'Bad Request: No valid session ID provided');
        }

        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => uuidv4(),
          onsessioninitialized: id => {
            transports.set(id, created);
            logger.info(`Session opened: ${id}`);
          }
        });
        created.onclose = () => {
          if (created.sessionId && transports.delete(created.sessionId)) {
            logger.info(`Session closed: ${created.sessionId}`);
          }
        };

        await createServer().connect(created);
        transport = created;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        jsonRpcError(res, 500, 'Internal server error');
      }
    }
  });

  // GET /mcp (server-to-client stream) and DELETE /mcp (end session)
  const handleSessionRequest = async (req: Request, res: Response) => {
    const sessionId = req.header('mcp-session-id');
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      return jsonRpcError(res, 400, 'Invalid or missing session ID');
    }

    try {
      await transport.handleRequest(req, res);
    } catch (error) {
      logger.error('Error handling MCP session request:', error);
      if (!res.headersSent) {
        jsonRpcError(res, 500, 'Internal server error');
      }
    }
  };

  app.get('/mcp', handleSessionRequest);
  app.delete('/mcp', handleSessionRequest);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return {
    app,
    async closeSessions(): Promise<void> {
      const open = [...transports.values()];
      transports.clear();
      await Promise.all(open.map(transport => transport.close()));
    }
  };
}
