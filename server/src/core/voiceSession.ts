/**
 * Voice Session
 *
 * One hosting session (a connected client). Utterances submitted to it are
 * handled strictly one after another: a turn, including its tool call,
 * finishes before the next one starts.
 */

import { v4 as uuidv4 } from 'uuid';
import { CommandInterpreter, Speaker, TurnReport } from './commandInterpreter';
import type { ToolContext } from '../executors/interface';
import { logger, describeError } from '../services/logger';

export class VoiceSession {
  readonly id: string = uuidv4();
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  constructor(
    private interpreter: CommandInterpreter,
    private source: ToolContext['source'] = 'voice',
    private speaker?: Speaker
  ) {}

  get queuedTurns(): number {
    return this.pending;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queue an utterance; resolves with the turn report once it has been handled.
   * `speaker` overrides the session's own speaker for this turn only.
   */
  submit(utterance: string, speaker: Speaker | undefined = this.speaker): Promise<TurnReport> {
    if (this.closed) {
      return Promise.reject(new Error(`Voice session ${this.id} is closed`));
    }
    if (!speaker) {
      return Promise.reject(new Error(`Voice session ${this.id} has no speaker`));
    }
    const turnSpeaker: Speaker = speaker;

    this.pending += 1;
    const turn = this.tail.then(() =>
      this.interpreter.handleUtterance(utterance, turnSpeaker, uuidv4(), this.source)
    );

    this.tail = turn.then(
      () => {
        this.pending -= 1;
      },
      (error: unknown) => {
        this.pending -= 1;
        logger.error('Voice turn rejected', { sessionId: this.id, error: describeError(error) });
      }
    );

    return turn;
  }

  /**
   * Stop accepting turns; resolves once the queued ones have finished
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }
}

/**
 * Speaker that records what would have been said, for request/response use
 */
export class CollectingSpeaker implements Speaker {
  readonly lines: string[] = [];

  async speak(text: string): Promise<void> {
    this.lines.push(text);
  }
}
