/**
 * Command Interpreter
 *
 * Turns one transcribed utterance into a spoken acknowledgment and at most
 * one tool call:
 *
 *   utterance → lower-case → first matching rule → extract args → registry
 *
 * The acknowledgment is spoken before extraction and dispatch and is never
 * conditioned on their success. Nothing thrown while handling a turn
 * escapes handleUtterance(); the worst case is one spoken apology.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  APOLOGY_MESSAGE,
  CommandRule,
  Extraction,
  RuleId,
} from './commandRules';
import type { ToolInvocation } from './schemas';
import type { ExecutionResult, ToolContext } from '../executors/interface';
import { logger, describeError } from '../services/logger';

export interface Speaker {
  speak(text: string): Promise<void>;
}

export interface ToolDispatcher {
  execute(toolName: string, params: unknown, context: ToolContext): Promise<ExecutionResult>;
}

export interface Interpretation {
  rule: RuleId;
  // Null when the tool's own result is the reply (greeting)
  acknowledgment: string | null;
  outcome: Extraction;
  invocation: ToolInvocation | null;
}

export type TurnStatus = 'dispatched' | 'clarified' | 'extraction_failed' | 'unmatched' | 'error';

export interface TurnReport {
  turnId: string;
  rule: RuleId | null;
  status: TurnStatus;
  result?: ExecutionResult;
}

export class CommandInterpreter {
  constructor(
    private dispatcher: ToolDispatcher,
    private rules: CommandRule[]
  ) {
    const last = rules[rules.length - 1];
    if (!last || last.id !== 'fallback') {
      throw new Error('Command rules must end with the fallback rule');
    }
  }

  /**
   * Pure interpretation: which rule fires, what it would say, what it would call
   */
  interpret(utterance: string): Interpretation {
    const text = utterance.toLowerCase();
    const rule = this.match(text);
    const acknowledgment = rule.acknowledgment(text);

    const outcome = this.extract(rule, text);

    return {
      rule: rule.id,
      acknowledgment,
      outcome,
      invocation: outcome.kind === 'invoke' ? outcome.invocation : null,
    };
  }

  /**
   * Run one voice turn to completion against a speaker
   */
  async handleUtterance(
    utterance: string,
    speaker: Speaker,
    turnId: string = uuidv4(),
    source: ToolContext['source'] = 'voice'
  ): Promise<TurnReport> {
    let ruleId: RuleId | null = null;

    try {
      logger.debug('User said', { turnId, utterance });

      const text = utterance.toLowerCase();
      const rule = this.match(text);
      ruleId = rule.id;

      const acknowledgment = rule.acknowledgment(text);
      if (acknowledgment) {
        await speaker.speak(acknowledgment);
      }

      const outcome = this.extract(rule, text);
      switch (outcome.kind) {
        case 'none':
          return { turnId, rule: rule.id, status: 'unmatched' };

        case 'clarify':
          await speaker.speak(outcome.message);
          return { turnId, rule: rule.id, status: 'clarified' };

        case 'failed':
          logger.warn('Failed to parse command', { turnId, rule: rule.id, utterance, reason: outcome.reason });
          if (rule.failureReply) {
            await speaker.speak(rule.failureReply);
          }
          return { turnId, rule: rule.id, status: 'extraction_failed' };

        case 'invoke': {
          const { tool, args } = outcome.invocation;
          const result = await this.dispatcher.execute(tool, args, { turnId, source });

          logger.log(result.success ? 'info' : 'warn', 'Tool result', {
            turnId,
            rule: rule.id,
            tool,
            success: result.success,
            code: result.error?.code,
            message: result.message,
          });

          const followUp = rule.followUp?.(result);
          if (followUp) {
            await speaker.speak(followUp);
          }
          return { turnId, rule: rule.id, status: 'dispatched', result };
        }
      }
    } catch (error) {
      logger.error('Command processing failed', { turnId, rule: ruleId, utterance, error: describeError(error) });
      try {
        await speaker.speak(APOLOGY_MESSAGE);
      } catch (speakError) {
        logger.error('Could not deliver apology', { turnId, error: describeError(speakError) });
      }
      return { turnId, rule: ruleId, status: 'error' };
    }
  }

  private extract(rule: CommandRule, text: string): Extraction {
    try {
      return rule.extract(text);
    } catch (error) {
      return { kind: 'failed', reason: describeError(error) };
    }
  }

  private match(text: string): CommandRule {
    for (const rule of this.rules) {
      if (rule.matches(text)) return rule;
    }
    // Unreachable while the fallback rule is last
    return this.rules[this.rules.length - 1];
  }
}
