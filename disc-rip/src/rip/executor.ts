import { spawn } from 'node:child_process';
import path from 'node:path';
import type { Readable } from 'node:stream';
import type { EventSink } from '../events/event-sink.js';
import { formatEvent, quoted } from '../events/event-sink.js';
import type { ProgressReporter, StreamName } from '../progress/types.js';
import { createProgressReporter, type ReporterFactory } from '../progress/reporter-factory.js';
import { ensureDirectory, fileSize, pathExists } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';
import { shellJoin } from '../utils/shell.js';
import { LineQueue, pumpLines, type StreamLine } from './line-queue.js';
import { RipExecutionError, failureFromSystemError, type RipFailure } from './errors.js';
import type { RipPlan, RipResult } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 250;
const DEFAULT_JOIN_TIMEOUT_MS = 1000;

/**
 * The parts of a child process the executor relies on
 */
export interface ChildProcessLike {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnFn = (command: string, args: readonly string[]) => ChildProcessLike;

export interface RipExecutorOptions {
  sink: EventSink;
  spawn?: SpawnFn;
  createReporter?: ReporterFactory;
  /** Writes human-readable lines (dry-run notices) to standard output */
  print?: (line: string) => void;
  /** How long to wait for output before polling the reporter */
  pollIntervalMs?: number;
  /** Minimum time between dvdbackup directory samples */
  sampleIntervalMs?: number;
  /** Upper bound on waiting for stream readers after the process exits */
  joinTimeoutMs?: number;
}

type ProcessOutcome =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: unknown };

const spawnProcess: SpawnFn = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Records how a child process ended, first event wins
 */
class ExitWatch {
  private result: ProcessOutcome | null = null;
  readonly done: Promise<ProcessOutcome>;

  constructor(child: ChildProcessLike) {
    this.done = new Promise(resolve => {
      const settle = (outcome: ProcessOutcome) => {
        if (this.result) return;
        this.result = outcome;
        resolve(outcome);
      };
      child.on('exit', (code, signal) => settle({ kind: 'exit', code, signal }));
      child.on('error', (error) => settle({ kind: 'error', error }));
    });
  }

  /** Non-blocking check; null while the process is still running */
  poll(): ProcessOutcome | null {
    return this.result;
  }
}

function failureFromOutcome(outcome: ProcessOutcome, tool: string): RipFailure | null {
  if (outcome.kind === 'error') {
    return failureFromSystemError(outcome.error, tool);
  }
  if (outcome.code === 0) {
    return null;
  }
  if (outcome.code === null) {
    return { kind: 'signal', tool, signal: outcome.signal ?? 'unknown' };
  }
  return { kind: 'non-zero-exit', tool, code: outcome.code };
}

/**
 * Runs rip plans: spawns the backend, feeds its output to a progress
 * reporter and turns every failure into a RipExecutionError.
 *
 * Plans are expected to run one at a time. The overwrite guard is a plain
 * existence check, so two executions aimed at the same destination race.
 */
export class RipExecutor {
  private readonly sink: EventSink;
  private readonly spawn: SpawnFn;
  private readonly createReporter: ReporterFactory;
  private readonly print: (line: string) => void;
  private readonly pollIntervalMs: number;
  private readonly joinTimeoutMs: number;

  constructor(options: RipExecutorOptions) {
    this.sink = options.sink;
    this.spawn = options.spawn ?? spawnProcess;
    this.createReporter = options.createReporter
      ?? ((plan, sink) => createProgressReporter(plan, { sink, sampleIntervalMs: options.sampleIntervalMs }));
    this.print = options.print ?? ((line) => console.log(line));
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.joinTimeoutMs = options.joinTimeoutMs ?? DEFAULT_JOIN_TIMEOUT_MS;
  }

  /**
   * Execute a plan. Returns null for dry-run plans, which touch nothing.
   */
  async execute(plan: RipPlan): Promise<RipResult | null> {
    const file = quoted(plan.destination);

    if (!plan.willExecute) {
      this.print(`[dry-run] Would execute: ${shellJoin(plan.command)}`);
      this.sink.emit(formatEvent('RIP_SKIPPED', { FILE: file, REASON: 'dry-run' }));
      return null;
    }

    if (await pathExists(plan.destination)) {
      this.sink.emit(formatEvent('RIP_GUARD', { FILE: file, REASON: 'destination-exists' }));
      throw new RipExecutionError({ kind: 'destination-exists', destination: plan.destination }, plan.destination);
    }

    try {
      await ensureDirectory(path.dirname(plan.destination));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      return this.fail(plan, { kind: 'io-error', detail }, null);
    }

    const reporter = await this.createReporter(plan, this.sink);

    let outcome: ProcessOutcome;
    try {
      outcome = await this.supervise(plan, reporter);
    } catch (error) {
      outcome = { kind: 'error', error };
    }

    const failure = failureFromOutcome(outcome, plan.command[0] ?? '');
    if (failure) {
      return this.fail(plan, failure, reporter);
    }

    const bytes = await fileSize(plan.destination);
    this.sink.emit(formatEvent('RIP_DONE', { FILE: file, BYTES: bytes ?? 'unknown', STATUS: 'success' }));
    await reporter.finalize(true);

    return { command: plan.command, exitCode: 0, bytes };
  }

  /**
   * Spawn the plan's command and pump both output streams through one queue
   * until the process has exited and both streams are drained
   */
  private async supervise(plan: RipPlan, reporter: ProgressReporter): Promise<ProcessOutcome> {
    const [command, ...args] = plan.command;
    logger.debug(`Spawning: ${shellJoin(plan.command)}`);

    const child = this.spawn(command, args);
    const exit = new ExitWatch(child);
    const queue = new LineQueue<StreamLine>();
    const finished = new Set<StreamName>();

    const readers: Promise<void>[] = [];
    for (const [name, stream] of [['stdout', child.stdout], ['stderr', child.stderr]] as const) {
      if (stream) {
        readers.push(pumpLines(stream, name, queue));
      } else {
        finished.add(name);
      }
    }
    const joined = Promise.allSettled(readers);

    for (;;) {
      const item = await queue.take(this.pollIntervalMs);

      if (item === undefined) {
        await reporter.handleIdle();
      } else if (item.line === null) {
        finished.add(item.stream);
      } else {
        logger.debug(`[${command}:${item.stream}] ${item.line}`);
        reporter.handleLine(item.stream, item.line);
      }

      const outcome = exit.poll();
      const streamsDone = finished.size === 2 || outcome?.kind === 'error';
      if (outcome && streamsDone && queue.size === 0) {
        break;
      }
    }

    await this.join(joined);
    return exit.done;
  }

  private async join(readers: Promise<unknown>): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(resolve, this.joinTimeoutMs);
    });
    await Promise.race([readers, timeout]);
    clearTimeout(timer);
  }

  private async fail(plan: RipPlan, failure: RipFailure, reporter: ProgressReporter | null): Promise<never> {
    const error = new RipExecutionError(failure, plan.destination);
    this.sink.emit(formatEvent('RIP_FAILED', {
      FILE: quoted(plan.destination),
      EXIT_CODE: error.exitCode,
      REASON: quoted(error.reason),
    }));
    await reporter?.finalize(false);
    throw error;
  }
}
