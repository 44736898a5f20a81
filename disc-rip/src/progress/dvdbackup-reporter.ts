import path from 'node:path';
import type { EventSink, EventValue } from '../events/event-sink.js';
import { formatEvent } from '../events/event-sink.js';
import type { RipPlan } from '../rip/types.js';
import { dvdbackupLabel } from '../rip/plan-builder.js';
import { directorySize } from '../utils/fs-utils.js';
import type { Clock, ProgressReporter, StreamName } from './types.js';
import { formatClock, formatPercent } from './clock.js';
import { probeVolumeSize, type VolumeProbe } from './volume-probe.js';

export const DEFAULT_SAMPLE_INTERVAL_MS = 300;

export interface DvdbackupReporterOptions {
  sink: EventSink;
  /** Directory dvdbackup writes into */
  outputDir: string;
  /** Expected output size; null when the disc could not be probed */
  totalBytes: number | null;
  /** Minimum wall time between directory samples */
  sampleIntervalMs?: number;
  measure?: (dir: string) => Promise<number>;
  now?: Clock;
}

export interface DvdbackupCreateOptions extends Omit<DvdbackupReporterOptions, 'outputDir' | 'totalBytes'> {
  probe?: VolumeProbe;
}

/**
 * Reports dvdbackup progress by polling the size of its output directory.
 * dvdbackup has no machine-readable progress, so bytes on disk stand in for it.
 */
export class DvdbackupProgressReporter implements ProgressReporter {
  readonly backend = 'dvdbackup' as const;

  private readonly sink: EventSink;
  private readonly outputDir: string;
  private readonly totalBytes: number | null;
  private readonly sampleIntervalMs: number;
  private readonly measure: (dir: string) => Promise<number>;
  private readonly now: Clock;
  private readonly startedAt: number;
  private lastBytes = 0;
  private lastSampleAt: number | null = null;

  constructor(options: DvdbackupReporterOptions) {
    this.sink = options.sink;
    this.outputDir = options.outputDir;
    this.totalBytes = options.totalBytes !== null && options.totalBytes > 0 ? options.totalBytes : null;
    this.sampleIntervalMs = options.sampleIntervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.measure = options.measure ?? directorySize;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  /**
   * Probe the plan's device for its size, then build a reporter watching
   * the directory dvdbackup creates for the plan (<destination dir>/<label>)
   */
  static async create(plan: RipPlan, options: DvdbackupCreateOptions): Promise<DvdbackupProgressReporter> {
    const { probe = probeVolumeSize, ...rest } = options;
    const totalBytes = await probe(plan.device);
    const outputDir = path.join(path.dirname(plan.destination), dvdbackupLabel(plan.destination, plan.title));
    return new DvdbackupProgressReporter({ ...rest, outputDir, totalBytes });
  }

  handleLine(_stream: StreamName, _line: string): void {
    // dvdbackup output carries no usable progress
  }

  async handleIdle(): Promise<void> {
    const now = this.now();
    if (this.lastSampleAt !== null && now - this.lastSampleAt < this.sampleIntervalMs) {
      return;
    }
    this.lastSampleAt = now;
    await this.sample(false);
  }

  async finalize(success: boolean): Promise<void> {
    if (!success) return;
    await this.sample(true);
  }

  private async sample(force: boolean): Promise<void> {
    const bytes = await this.measure(this.outputDir);
    if (!force && bytes === this.lastBytes) return;
    this.lastBytes = bytes;

    const event: Record<string, EventValue> = { BACKEND: this.backend };
    if (this.totalBytes !== null) {
      event.PCT = formatPercent(Math.min(100, (bytes / this.totalBytes) * 100));
    }
    event.ELAPSED = formatClock((this.now() - this.startedAt) / 1000);
    event.BYTES_DONE = bytes;
    event.BYTES_TOTAL = this.totalBytes ?? 'unknown';
    if (this.totalBytes === null) {
      event.SPINNER = true;
    }

    this.sink.emit(formatEvent('PROGRESS', event));
  }
}
