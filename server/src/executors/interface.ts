/**
 * Tool Executor Interface
 *
 * Defines the contract between the command interpreter and actual execution.
 * Every tool executor must implement this interface.
 *
 * Key principles:
 * - One human-readable message per call, success or not
 * - Failures are flagged on the result, never thrown to the caller
 * - Arguments are validated against the tool's schema before execution
 */

import { z } from 'zod';
import { ToolNameType } from '../core/schemas';
import { logger, describeError } from '../services/logger';

// =============================================================================
// INVOCATION CONTEXT
// =============================================================================

/**
 * Opaque context handed to every tool call. Tools may log it; they must not
 * branch on it.
 */
export interface ToolContext {
  turnId: string;
  source: 'voice' | 'http' | 'internal';
}

// =============================================================================
// EXECUTION RESULT
// =============================================================================

export interface ExecutionResult {
  success: boolean;
  // Human-readable message, spoken or logged by the caller
  message: string;
  // Error details if failed
  error?: {
    code: string;
    recoverable: boolean;
  };
  // Execution metadata
  meta: {
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
    executor: string;
  };
}

/**
 * Build a result with timing metadata filled in
 */
export function buildResult(
  executor: string,
  startedAt: Date,
  message: string,
  failure?: { code: string; recoverable?: boolean }
): ExecutionResult {
  const completedAt = new Date();
  return {
    success: !failure,
    message,
    ...(failure && {
      error: { code: failure.code, recoverable: failure.recoverable ?? true },
    }),
    meta: {
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      executor,
    },
  };
}

// =============================================================================
// EXECUTOR INTERFACE
// =============================================================================

export interface IToolExecutor<TParams> {
  // Tool identifier the interpreter dispatches on
  readonly id: ToolNameType;
  // Human-readable name
  readonly name: string;
  // What category of tool this is
  readonly category: 'system' | 'information' | 'communication' | 'productivity' | 'social';
  readonly description: string;
  // Zod schema for parameters
  readonly schema: z.ZodType<TParams, z.ZodTypeDef, unknown>;

  /**
   * Execute the tool. Implementations map every failure they can
   * classify to a message; anything else is caught by the registry.
   */
  execute(params: TParams, context: ToolContext): Promise<ExecutionResult>;
}

export interface ToolDescriptor {
  name: ToolNameType;
  displayName: string;
  category: string;
  description: string;
}

// =============================================================================
// EXECUTOR REGISTRY
// =============================================================================

interface RegisteredTool {
  descriptor: ToolDescriptor;
  run(params: unknown, context: ToolContext): Promise<ExecutionResult>;
}

export class ExecutorRegistry {
  private tools: Map<string, RegisteredTool> = new Map();

  /**
   * Register an executor. Re-registering an id replaces the previous one.
   */
  register<TParams>(executor: IToolExecutor<TParams>): void {
    this.tools.set(executor.id, {
      descriptor: {
        name: executor.id,
        displayName: executor.name,
        category: executor.category,
        description: executor.description,
      },
      run: async (params, context) => {
        const startedAt = new Date();
        const parsed = executor.schema.safeParse(params);
        if (!parsed.success) {
          const details = parsed.error.issues
            .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
            .join(', ');
          logger.warn('Tool parameters rejected', { tool: executor.id, turnId: context.turnId, details });
          return buildResult(executor.id, startedAt, `Validation failed: ${details}`, {
            code: 'VALIDATION_FAILED',
          });
        }
        return executor.execute(parsed.data, context);
      },
    });

    logger.debug(`Registered tool ${executor.id} (${executor.name})`);
  }

  has(toolName: string): boolean {
    return this.tools.has(toolName);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), (t) => t.descriptor);
  }

  /**
   * Execute a tool by name. Never throws.
   */
  async execute(toolName: string, params: unknown, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const tool = this.tools.get(toolName);

    if (!tool) {
      return buildResult('none', startedAt, `No executor found for tool: ${toolName}`, {
        code: 'NO_EXECUTOR',
        recoverable: false,
      });
    }

    try {
      return await tool.run(params, context);
    } catch (error) {
      logger.error('Tool threw past its boundary', {
        tool: toolName,
        turnId: context.turnId,
        error: describeError(error),
      });
      return buildResult(toolName, startedAt, `An unexpected error occurred while running ${toolName}.`, {
        code: 'EXECUTOR_CRASHED',
      });
    }
  }
}
