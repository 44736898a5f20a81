import type { EventSink } from '../events/event-sink.js';
import type { RipPlan } from '../rip/types.js';
import { backendOf } from '../rip/plan-builder.js';
import type { Clock, ProgressReporter, StreamName } from './types.js';
import { FfmpegProgressReporter } from './ffmpeg-reporter.js';
import { DvdbackupProgressReporter } from './dvdbackup-reporter.js';
import type { VolumeProbe } from './volume-probe.js';

export interface ReporterDependencies {
  sink: EventSink;
  now?: Clock;
  sampleIntervalMs?: number;
  probe?: VolumeProbe;
  measure?: (dir: string) => Promise<number>;
}

/** Used for commands that are neither ffmpeg nor dvdbackup */
export class SilentProgressReporter implements ProgressReporter {
  readonly backend = null;

  handleLine(_stream: StreamName, _line: string): void {}

  async handleIdle(): Promise<void> {}

  async finalize(_success: boolean): Promise<void> {}
}

/**
 * Choose the progress reporter for a plan's backend
 */
export async function createProgressReporter(
  plan: RipPlan,
  deps: ReporterDependencies
): Promise<ProgressReporter> {
  switch (backendOf(plan)) {
    case 'ffmpeg':
      return new FfmpegProgressReporter({
        sink: deps.sink,
        durationSeconds: plan.title.durationSeconds,
        now: deps.now,
      });
    case 'dvdbackup':
      return DvdbackupProgressReporter.create(plan, deps);
    case null:
      return new SilentProgressReporter();
  }
}

export type ReporterFactory = (plan: RipPlan, sink: EventSink) => Promise<ProgressReporter>;
