/**
 * Command Interpreter Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { CommandInterpreter, ToolDispatcher } from './commandInterpreter';
import {
  APOLOGY_MESSAGE,
  createCommandRules,
  FALLBACK_MESSAGE,
  SCHEDULE_CLARIFY_MESSAGE,
  SCHEDULE_FAILURE_MESSAGE,
  SCHEDULE_SUCCESS_MESSAGE,
  SEARCH_CLARIFY_MESSAGE,
} from './commandRules';
import { CollectingSpeaker } from './voiceSession';
import { buildResult, ExecutionResult, ToolContext } from '../executors/interface';

function okResult(tool: string, message = 'ok'): ExecutionResult {
  return buildResult(tool, new Date(), message);
}

function stubDispatcher(
  impl: (tool: string, params: unknown, context: ToolContext) => Promise<ExecutionResult> = async (tool) =>
    okResult(tool)
) {
  const execute = vi.fn(impl);
  const dispatcher: ToolDispatcher = { execute };
  return { dispatcher, execute };
}

function createInterpreter(dispatcher: ToolDispatcher): CommandInterpreter {
  return new CommandInterpreter(dispatcher, createCommandRules({ defaultCity: 'Manila' }));
}

describe('CommandInterpreter', () => {
  it('refuses a rule list without a trailing fallback', () => {
    const { dispatcher } = stubDispatcher();
    const rules = createCommandRules({ defaultCity: 'Manila' }).slice(0, -1);
    expect(() => new CommandInterpreter(dispatcher, rules)).toThrow('fallback');
  });

  // ---------------------------------------------------------------------------
  // interpret()
  // ---------------------------------------------------------------------------

  describe('interpret', () => {
    const { dispatcher } = stubDispatcher();
    const interpreter = createInterpreter(dispatcher);

    it('lower-cases before matching', () => {
      expect(interpreter.interpret('OPEN Notepad')).toMatchObject({
        rule: 'open_app',
        acknowledgment: 'Roger that, opening notepad.',
        invocation: { tool: 'open_app', args: { appName: 'notepad' } },
      });
    });

    it('uses the default city when none is named', () => {
      expect(interpreter.interpret("What's the weather like?").invocation).toEqual({
        tool: 'get_weather',
        args: { city: 'Manila' },
      });
    });

    it('reports a failed extraction without throwing', () => {
      const result = interpreter.interpret('send email to someone');
      expect(result.rule).toBe('email');
      expect(result.outcome.kind).toBe('failed');
      expect(result.invocation).toBeNull();
    });

    it('is stable across calls', () => {
      expect(interpreter.interpret('remind me to drink water in 20 minutes')).toEqual(
        interpreter.interpret('remind me to drink water in 20 minutes')
      );
    });

    it('falls back for unknown commands', () => {
      expect(interpreter.interpret('sing me a song')).toEqual({
        rule: 'fallback',
        acknowledgment: FALLBACK_MESSAGE,
        outcome: { kind: 'none' },
        invocation: null,
      });
    });
  });

  // ---------------------------------------------------------------------------
  // handleUtterance()
  // ---------------------------------------------------------------------------

  describe('handleUtterance', () => {
    it('speaks the acknowledgment and dispatches the tool', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('weather in Cebu', speaker, 'turn-1');

      expect(speaker.lines).toEqual(['Check! Getting the weather.']);
      expect(execute).toHaveBeenCalledWith('get_weather', { city: 'cebu' }, { turnId: 'turn-1', source: 'voice' });
      expect(report).toMatchObject({ turnId: 'turn-1', rule: 'weather', status: 'dispatched' });
    });

    it('speaks the acknowledgment before the tool runs', async () => {
      const order: string[] = [];
      const { dispatcher } = stubDispatcher(async (tool) => {
        order.push(`tool:${tool}`);
        return okResult(tool);
      });
      const speaker = {
        speak: vi.fn(async (text: string) => {
          order.push(`speak:${text}`);
        }),
      };

      await createInterpreter(dispatcher).handleUtterance('search for vitest', speaker);

      expect(order).toEqual(['speak:Will do, searching the web.', 'tool:search_web']);
    });

    it('speaks the fallback and dispatches nothing for unknown input', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('dance', speaker);

      expect(speaker.lines).toEqual([FALLBACK_MESSAGE]);
      expect(execute).not.toHaveBeenCalled();
      expect(report.status).toBe('unmatched');
    });

    it('asks for a search query instead of searching for nothing', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('search for', speaker);

      expect(speaker.lines).toEqual(['Will do, searching the web.', SEARCH_CLARIFY_MESSAGE]);
      expect(execute).not.toHaveBeenCalled();
      expect(report.status).toBe('clarified');
    });

    it('asks for a duration when a schedule has none', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      await createInterpreter(dispatcher).handleUtterance('schedule dentist', speaker);

      expect(speaker.lines).toEqual(['Got it! Scheduling that in your Google Calendar.', SCHEDULE_CLARIFY_MESSAGE]);
      expect(execute).not.toHaveBeenCalled();
    });

    it('speaks the schedule apology when the minutes are not a number', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('schedule dentist in soon minutes', speaker);

      expect(speaker.lines).toEqual(['Got it! Scheduling that in your Google Calendar.', SCHEDULE_FAILURE_MESSAGE]);
      expect(execute).not.toHaveBeenCalled();
      expect(report.status).toBe('extraction_failed');
    });

    it('stays quiet after the acknowledgment when an email cannot be parsed', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('send email to bob', speaker);

      expect(speaker.lines).toEqual(['Check! Sending your email.']);
      expect(execute).not.toHaveBeenCalled();
      expect(report.status).toBe('extraction_failed');
    });

    it('confirms a schedule only when the calendar call succeeded', async () => {
      const speakerOk = new CollectingSpeaker();
      const ok = stubDispatcher();
      await createInterpreter(ok.dispatcher).handleUtterance('schedule review in 5 minutes', speakerOk);
      expect(speakerOk.lines[1]).toBe(SCHEDULE_SUCCESS_MESSAGE);
      expect(ok.execute).toHaveBeenCalledWith(
        'schedule_task',
        { title: 'review', description: 'review', minutesFromNow: 5 },
        expect.objectContaining({ source: 'voice' })
      );

      const speakerFail = new CollectingSpeaker();
      const failing = stubDispatcher(async (tool) =>
        buildResult(tool, new Date(), 'calendar down', { code: 'CALENDAR_ERROR' })
      );
      await createInterpreter(failing.dispatcher).handleUtterance('schedule review in 5 minutes', speakerFail);
      expect(speakerFail.lines[1]).toBe(SCHEDULE_FAILURE_MESSAGE);
    });

    it('speaks the greeting returned by the tool and nothing before it', async () => {
      const { dispatcher } = stubDispatcher(async (tool) =>
        okResult(tool, 'Good evening, User! You have 2 reminders today.')
      );
      const speaker = new CollectingSpeaker();

      await createInterpreter(dispatcher).handleUtterance('Hello', speaker);

      expect(speaker.lines).toEqual(['Good evening, User! You have 2 reminders today.']);
    });

    it('apologizes once when the dispatcher throws', async () => {
      const { dispatcher } = stubDispatcher(async () => {
        throw new Error('registry exploded');
      });
      const speaker = new CollectingSpeaker();

      const report = await createInterpreter(dispatcher).handleUtterance('open notepad', speaker);

      expect(speaker.lines).toEqual(['Roger that, opening notepad.', APOLOGY_MESSAGE]);
      expect(report).toMatchObject({ rule: 'open_app', status: 'error' });
    });

    it('resolves even when the speaker itself fails', async () => {
      const { dispatcher, execute } = stubDispatcher();
      const speaker = { speak: vi.fn(async () => Promise.reject(new Error('audio device gone'))) };

      const report = await createInterpreter(dispatcher).handleUtterance('open notepad', speaker);

      expect(report.status).toBe('error');
      expect(execute).not.toHaveBeenCalled();
      expect(speaker.speak).toHaveBeenCalledTimes(2);
      expect(speaker.speak).toHaveBeenLastCalledWith(APOLOGY_MESSAGE);
    });

    it('passes the source through to the tool context', async () => {
      const { dispatcher, execute } = stubDispatcher();

      await createInterpreter(dispatcher).handleUtterance('open paint', new CollectingSpeaker(), 't-9', 'http');

      expect(execute).toHaveBeenCalledWith('open_app', { appName: 'paint' }, { turnId: 't-9', source: 'http' });
    });
  });
});
