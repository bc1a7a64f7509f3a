/**
 * Scheduler - the hourly analysis loop
 *
 * idle -> active (after the startup announcement) -> stopped (on abort)
 *
 * While active, every cycle:
 *   checking-window -> analyzing (only inside the active window) -> sleeping
 *
 * Instruments are analysed one at a time in configured order. A failure in
 * one instrument is logged and the next one still runs. The next wake-up is
 * computed from the time sampled after the analysis pass, so slow providers
 * shift one tick but never accumulate drift.
 */

import { setTimeout as delay } from 'timers/promises';
import { addHours, addMilliseconds, subMilliseconds } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { v4 as uuidv4 } from 'uuid';
import { ActiveWindow, ScheduleConfig, TimeOfDay } from '../types/config';
import { Instrument } from '../types/instrument';
import { MessageSender } from '../types/messaging';
import { Logger, describeError, noopLogger } from '../utils/logger';
import { DeliveryResult } from './analysis';

/**
 * Source of time, injectable for tests
 */
export interface Clock {
  now(): Date;
  /** Resolves after `ms`; rejects if `signal` aborts first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms, signal) => delay(ms, undefined, { signal })
};

/**
 * Anything that can produce and deliver one instrument's report
 */
export interface InstrumentPipeline {
  /** Resolves to undefined when delivery was skipped for shutdown */
  run(instrument: Instrument, signal?: AbortSignal): Promise<DeliveryResult | undefined>;
}

export type SchedulerState = 'idle' | 'active' | 'stopped';

export type CyclePhase = 'checking-window' | 'analyzing' | 'sleeping';

export interface CycleSummary {
  runId: string;
  startedAt: Date;
  inWindow: boolean;
  /** Instrument ids whose report went through delivery */
  analyzed: string[];
  /** Instrument ids whose pipeline threw */
  failed: string[];
  /** Instrument ids not delivered because the run was cancelled */
  skipped: string[];
  sleepMs: number;
}

export interface SchedulerOptions {
  config: ScheduleConfig;
  instruments: readonly Instrument[];
  pipeline: InstrumentPipeline;
  messenger: MessageSender;
  clock?: Clock;
  logger?: Logger;
  onCycle?: (summary: CycleSummary) => void;
}

/**
 * Error thrown when the scheduler is misused
 */
export class SchedulerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchedulerError';
  }
}

/**
 * Wall-clock hour and minute of `date` in `timeZone`
 */
export function timeOfDayIn(date: Date, timeZone: string): TimeOfDay {
  const [hour, minute] = formatInTimeZone(date, timeZone, 'H:m').split(':').map(Number);
  return { hour, minute };
}

/**
 * True when `date` falls in the window, both bounds inclusive at minute
 * resolution (21:30:59 is inside a window ending 21:30; 21:31:00 is not)
 */
export function isWithinActiveWindow(date: Date, window: ActiveWindow): boolean {
  const { hour, minute } = timeOfDayIn(date, window.timeZone);
  const minutes = hour * 60 + minute;
  const start = window.start.hour * 60 + window.start.minute;
  const end = window.end.hour * 60 + window.end.minute;
  return minutes >= start && minutes <= end;
}

/**
 * Start of the next hour in `timeZone`, plus `offsetMs`
 */
export function nextRunAt(now: Date, timeZone: string, offsetMs: number): Date {
  const [minute, second, millisecond] = formatInTimeZone(now, timeZone, 'm:s:SSS').split(':').map(Number);
  const topOfHour = subMilliseconds(now, minute * 60000 + second * 1000 + millisecond);
  return addMilliseconds(addHours(topOfHour, 1), offsetMs);
}

/**
 * Milliseconds to sleep from `now` until the next run, never below the floor
 */
export function computeSleepMs(now: Date, config: ScheduleConfig): number {
  const next = nextRunAt(now, config.window.timeZone, config.wakeOffsetMs);
  return Math.max(next.getTime() - now.getTime(), config.minSleepMs);
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

export function startupAnnouncement(window: ActiveWindow): string {
  return (
    '🤖 Crypto report bot started (educational). Reports are sent every hour between ' +
    `${formatTimeOfDay(window.start)} and ${formatTimeOfDay(window.end)} (${window.timeZone}).`
  );
}

export class Scheduler {
  private readonly config: ScheduleConfig;
  private readonly instruments: readonly Instrument[];
  private readonly pipeline: InstrumentPipeline;
  private readonly messenger: MessageSender;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly onCycle?: (summary: CycleSummary) => void;

  private state: SchedulerState = 'idle';
  private phase?: CyclePhase;

  constructor(options: SchedulerOptions) {
    this.config = options.config;
    this.instruments = [...options.instruments];
    this.pipeline = options.pipeline;
    this.messenger = options.messenger;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? noopLogger;
    this.onCycle = options.onCycle;
  }

  getState(): SchedulerState {
    return this.state;
  }

  getPhase(): CyclePhase | undefined {
    return this.phase;
  }

  /**
   * Run until `signal` aborts
   *
   * Resolves once the loop has stopped; only ever rejects for misuse.
   *
   * @throws SchedulerError if the scheduler was already started, or if the
   * clock fails to sleep even for the minimum interval
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.state !== 'idle') {
      throw new SchedulerError(`Scheduler cannot start from state ${this.state}`);
    }

    await this.announceStartup();
    this.state = 'active';

    try {
      while (!signal.aborted) {
        const summary = await this.runCycle(signal);
        if (signal.aborted) break;

        this.phase = 'sleeping';
        this.logger.debug(`Sleeping ${Math.round(summary.sleepMs / 1000)}s until next cycle`);
        try {
          await this.clock.sleep(summary.sleepMs, signal);
        } catch (error) {
          if (signal.aborted) break;
          // Non-abort sleep failures fall back to the minimum interval
          this.logger.error(`Sleep failed: ${describeError(error)}`);
          await this.sleepFloor(signal);
        }
      }
    } finally {
      this.state = 'stopped';
      this.phase = undefined;
    }

    this.logger.info('Scheduler stopped');
  }

  /**
   * One pass: window check, analysis of every instrument if inside the
   * window, and the sleep that should follow
   */
  async runCycle(signal?: AbortSignal): Promise<CycleSummary> {
    const runId = uuidv4();
    const startedAt = this.clock.now();

    this.phase = 'checking-window';
    const inWindow = isWithinActiveWindow(startedAt, this.config.window);
    const analyzed: string[] = [];
    const failed: string[] = [];
    const skipped: string[] = [];

    if (inWindow) {
      this.phase = 'analyzing';
      this.logger.info(`Cycle ${runId}: analysing ${this.instruments.length} instruments`);

      for (const instrument of this.instruments) {
        if (signal?.aborted) break;
        try {
          const result = await this.pipeline.run(instrument, signal);
          if (result) {
            analyzed.push(instrument.id);
          } else {
            skipped.push(instrument.id);
          }
        } catch (error) {
          failed.push(instrument.id);
          this.logger.error(`Cycle ${runId}: analysis of ${instrument.id} failed: ${describeError(error)}`);
        }
      }
    } else {
      this.logger.debug(`Cycle ${runId}: outside active window`);
    }

    const sleepMs = computeSleepMs(this.clock.now(), this.config);
    const summary: CycleSummary = { runId, startedAt, inWindow, analyzed, failed, skipped, sleepMs };
    this.notifyCycle(summary);
    return summary;
  }

  private notifyCycle(summary: CycleSummary): void {
    if (!this.onCycle) return;
    try {
      this.onCycle(summary);
    } catch (error) {
      this.logger.error(`Cycle ${summary.runId}: onCycle hook failed: ${describeError(error)}`);
    }
  }

  private async announceStartup(): Promise<void> {
    try {
      await this.messenger.sendMessage(startupAnnouncement(this.config.window));
    } catch (error) {
      this.logger.warn(`Startup announcement not sent: ${describeError(error)}`);
    }
  }

  private async sleepFloor(signal: AbortSignal): Promise<void> {
    try {
      await this.clock.sleep(this.config.minSleepMs, signal);
    } catch (error) {
      if (signal.aborted) return;
      throw new SchedulerError(`Clock cannot sleep: ${describeError(error)}`);
    }
  }
}
