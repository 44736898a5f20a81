import type { EventSink, EventValue } from '../events/event-sink.js';
import { formatEvent } from '../events/event-sink.js';
import type { Clock, ProgressReporter, StreamName } from './types.js';
import { formatClock, formatPercent } from './clock.js';

export interface FfmpegReporterOptions {
  sink: EventSink;
  /** Expected running time of the title; 0 when unknown */
  durationSeconds: number;
  now?: Clock;
}

/**
 * Parse ffmpeg's speed field ("2.0x", " 1.5x") into a multiplier
 */
export function parseSpeed(token: string | undefined): number | null {
  if (!token) return null;
  const match = token.trim().match(/^(\d+(?:\.\d+)?(?:e[+-]?\d+)?)x$/i);
  if (!match) return null;
  const speed = parseFloat(match[1]);
  return speed > 0 ? speed : null;
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reports progress from ffmpeg's `-progress pipe:2` output.
 *
 * ffmpeg writes blocks of key=value lines on stderr, each terminated by
 * `progress=continue` or `progress=end`. Fields accumulate until the
 * terminator, which triggers one PROGRESS event and clears them.
 */
export class FfmpegProgressReporter implements ProgressReporter {
  readonly backend = 'ffmpeg' as const;

  private readonly sink: EventSink;
  private readonly durationSeconds: number;
  private readonly now: Clock;
  private readonly startedAt: number;
  private fields = new Map<string, string>();
  private lastPct: number | null = null;

  constructor(options: FfmpegReporterOptions) {
    this.sink = options.sink;
    this.durationSeconds = options.durationSeconds > 0 ? options.durationSeconds : 0;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  /** Last percentage reported, null before the first one */
  get lastReportedPct(): number | null {
    return this.lastPct;
  }

  handleLine(stream: StreamName, line: string): void {
    if (stream !== 'stderr') return;

    const separator = line.indexOf('=');
    if (separator <= 0) return;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    if (key !== 'progress') {
      this.fields.set(key, value);
      return;
    }

    if (value === 'continue' || value === 'end') {
      this.report(value === 'end');
    }
    this.fields.clear();
  }

  async handleIdle(): Promise<void> {
    // Progress arrives on stderr; nothing to poll
  }

  async finalize(success: boolean): Promise<void> {
    if (!success || this.durationSeconds === 0) return;
    if (this.lastPct !== null && this.lastPct >= 100) return;

    this.lastPct = 100;
    this.sink.emit(formatEvent('PROGRESS', {
      BACKEND: this.backend,
      PCT: formatPercent(100),
      ETA: formatClock(0),
      ELAPSED: formatClock(this.elapsedSeconds()),
    }));
  }

  private report(ended: boolean): void {
    const speedToken = this.fields.get('speed');
    const speed = parseSpeed(speedToken);
    const bytesDone = parseNumber(this.fields.get('total_size'));

    const event: Record<string, EventValue> = { BACKEND: this.backend };

    if (this.durationSeconds > 0) {
      const estimate = this.estimate(ended);
      if (estimate) {
        this.lastPct = estimate.pct;
        event.PCT = formatPercent(estimate.pct);
        event.ETA = formatClock(speed ? estimate.remainingSeconds / speed : estimate.remainingSeconds);
      }
    }

    if (speed !== null && speedToken !== undefined) {
      event.SPEED = speedToken.trim();
    }
    event.ELAPSED = formatClock(this.elapsedSeconds());
    if (bytesDone !== null && bytesDone >= 0) {
      event.BYTES_DONE = bytesDone;
    }
    if (this.durationSeconds === 0) {
      event.SPINNER = true;
    }

    this.sink.emit(formatEvent('PROGRESS', event));
  }

  /**
   * progress=end always means 100% with nothing remaining, whatever the counters say
   */
  private estimate(ended: boolean): { pct: number; remainingSeconds: number } | null {
    if (ended) {
      return { pct: 100, remainingSeconds: 0 };
    }

    const outTimeMs = parseNumber(this.fields.get('out_time_ms'));
    if (outTimeMs === null) return null;

    const pct = Math.min(100, Math.max(0, (outTimeMs / (this.durationSeconds * 1000)) * 100));
    const remainingSeconds = Math.max(0, this.durationSeconds - outTimeMs / 1000);
    return { pct, remainingSeconds };
  }

  private elapsedSeconds(): number {
    return (this.now() - this.startedAt) / 1000;
  }
}
