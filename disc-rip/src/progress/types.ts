import type { Backend } from '../rip/types.js';

export type StreamName = 'stdout' | 'stderr';

/**
 * Turns a backend's output or filesystem state into PROGRESS events.
 * One instance serves exactly one process run.
 */
export interface ProgressReporter {
  readonly backend: Backend | null;

  /** Called for every line the process writes, tagged with its stream */
  handleLine(stream: StreamName, line: string): void;

  /** Called whenever the output queue stays empty for one poll interval */
  handleIdle(): Promise<void>;

  /** Called once after the process has exited */
  finalize(success: boolean): Promise<void>;
}

/** Milliseconds since some fixed point; Date.now by default */
export type Clock = () => number;
