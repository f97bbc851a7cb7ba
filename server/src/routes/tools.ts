/**
 * Tools Routes
 *
 * Direct tool execution, bypassing the interpreter:
 * - Registry listing
 * - Parameter validation (by the registry, against each tool's schema)
 * - Audit logging of every call
 */

import { Router, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { requireAuth, AuthenticatedRequest } from '../middleware/auth';
import { ExecuteToolRequest } from '../core/schemas';
import { ExecutorRegistry } from '../executors';
import { logger, auditLog, describeError } from '../services/logger';

export interface ToolsRouterDeps {
  registry: ExecutorRegistry;
  jwtSecret: string;
}

export function createToolsRouter({ registry, jwtSecret }: ToolsRouterDeps): Router {
  const router = Router();
  router.use(requireAuth(jwtSecret));

  /**
   * GET /api/v1/tools
   * List registered tools
   */
  router.get('/', (req: AuthenticatedRequest, res: Response) => {
    res.json({ tools: registry.list() });
  });

  /**
   * POST /api/v1/tools/execute
   * Execute a tool by name
   */
  router.post('/execute', async (req: AuthenticatedRequest, res: Response) => {
    const request = ExecuteToolRequest.safeParse(req.body);
    if (!request.success) {
      res.status(400).json({ error: 'Invalid request', details: request.error.issues });
      return;
    }

    const { name, parameters = {} } = request.data;
    const turnId = uuidv4();

    if (!registry.has(name)) {
      logger.warn('Tool execution rejected', { userId: req.user?.userId, tool: name });
      res.status(404).json({ error: `Unknown tool: ${name}` });
      return;
    }

    try {
      const result = await registry.execute(name, parameters, { turnId, source: 'http' });

      auditLog('TOOL_EXECUTED', {
        userId: req.user?.userId,
        tool: name,
        turnId,
        success: result.success,
        code: result.error?.code,
        durationMs: result.meta.durationMs,
        ip: req.ip,
      });

      res.json({ turnId, ...result });
    } catch (error) {
      logger.error('Tool execution error', { tool: name, turnId, error: describeError(error) });
      res.status(500).json({ error: 'Tool execution failed' });
    }
  });

  return router;
}
