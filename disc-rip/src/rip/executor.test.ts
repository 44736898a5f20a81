import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { existsSync, writeFileSync } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { RipExecutor, type SpawnFn } from './executor.js';
import { RipExecutionError } from './errors.js';
import { buildRipPlan } from './plan-builder.js';
import type { RipPlan, TitleInfo } from './types.js';
import { CollectingEventSink } from '../events/event-sink.js';
import { FfmpegProgressReporter } from '../progress/ffmpeg-reporter.js';
import type { ProgressReporter, StreamName } from '../progress/types.js';
import type { ReporterFactory } from '../progress/reporter-factory.js';
import { isAccessible } from '../utils/fs-utils.js';

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.stdout.end();
    this.stderr.end();
    this.emit('exit', code, signal);
  }
}

interface SpawnCall {
  command: string;
  args: string[];
}

function fakeSpawn(script: (child: FakeChild) => void): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args) => {
    calls.push({ command, args: [...args] });
    const child = new FakeChild();
    setTimeout(() => script(child), 0);
    return child;
  };
  return { spawn, calls };
}

class RecordingReporter implements ProgressReporter {
  readonly backend = null;
  readonly lines: Array<[StreamName, string]> = [];
  readonly finalized: boolean[] = [];
  idleCount = 0;

  handleLine(stream: StreamName, line: string): void {
    this.lines.push([stream, line]);
  }

  async handleIdle(): Promise<void> {
    this.idleCount++;
  }

  async finalize(success: boolean): Promise<void> {
    this.finalized.push(success);
  }
}

async function captureError(promise: Promise<unknown>): Promise<RipExecutionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RipExecutionError) return error;
    throw error;
  }
  throw new Error('expected execute to fail');
}

const title: TitleInfo = { label: 'Main Feature', durationSeconds: 95 * 60, chapters: [] };
const onlyFfmpeg = (name: string) => (name === 'ffmpeg' ? '/usr/bin/ffmpeg' : null);

describe('RipExecutor', () => {
  let tempDir: string;
  let sink: CollectingEventSink;
  let reporter: RecordingReporter;
  let printed: string[];

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'disc-rip-executor-test-'));
    sink = new CollectingEventSink();
    reporter = new RecordingReporter();
    printed = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function ffmpegPlan(destination: string, dryRun = false): RipPlan {
    return buildRipPlan('/dev/sr0', title, destination, { dryRun, resolveTool: onlyFfmpeg });
  }

  function executor(spawn: SpawnFn, createReporter?: ReporterFactory): RipExecutor {
    return new RipExecutor({
      sink,
      spawn,
      createReporter: createReporter ?? (async () => reporter),
      print: (line) => printed.push(line),
      pollIntervalMs: 10,
      joinTimeoutMs: 20,
    });
  }

  describe('dry run', () => {
    it('should print the command and spawn nothing', async () => {
      const destination = path.join(tempDir, 'out', 'My Movie.mp4');
      const { spawn, calls } = fakeSpawn(child => child.finish(0));
      const rip = executor(spawn);
      const plan = ffmpegPlan(destination, true);

      expect(await rip.execute(plan)).toBeNull();
      expect(await rip.execute(plan)).toBeNull();

      expect(calls).toEqual([]);
      expect(printed).toEqual([
        `[dry-run] Would execute: ffmpeg -hide_banner -nostats -loglevel error -progress pipe:2 -i /dev/sr0 '${destination}'`,
        `[dry-run] Would execute: ffmpeg -hide_banner -nostats -loglevel error -progress pipe:2 -i /dev/sr0 '${destination}'`,
      ]);
      expect(sink.named('RIP_SKIPPED')).toEqual([
        `EVENT=RIP_SKIPPED FILE="${destination}" REASON=dry-run`,
        `EVENT=RIP_SKIPPED FILE="${destination}" REASON=dry-run`,
      ]);
      expect(await isAccessible(path.join(tempDir, 'out'))).toBe(false);
    });
  });

  describe('overwrite guard', () => {
    it('should refuse an existing destination without spawning', async () => {
      const destination = path.join(tempDir, 'movie.mp4');
      await fs.writeFile(destination, 'already ripped');
      const { spawn, calls } = fakeSpawn(child => child.finish(0));

      const error = await captureError(executor(spawn).execute(ffmpegPlan(destination)));

      expect(error.exitCode).toBe(2);
      expect(error.failure).toEqual({ kind: 'destination-exists', destination });
      expect(error.message).toBe(`Destination already exists: ${destination}`);
      expect(calls).toEqual([]);
      expect(sink.lines).toEqual([`EVENT=RIP_GUARD FILE="${destination}" REASON=destination-exists`]);
      expect(await fs.readFile(destination, 'utf-8')).toBe('already ripped');
    });
  });

  describe('successful run', () => {
    it('should report progress and completion for an ffmpeg rip', async () => {
      const destination = path.join(tempDir, 'out', 'movie.mp4');
      const { spawn, calls } = fakeSpawn(child => {
        child.stderr.write('out_time_ms=2850000\nspeed=2.0x\ntotal_size=4096\nprogress=continue\n');
        writeFileSync(destination, 'ripped data');
        child.finish(0);
      });
      const rip = executor(spawn, async (plan, eventSink) =>
        new FfmpegProgressReporter({ sink: eventSink, durationSeconds: plan.title.durationSeconds, now: () => 0 })
      );
      const plan = ffmpegPlan(destination);

      const result = await rip.execute(plan);

      expect(plan.command[0]).toBe('ffmpeg');
      expect(plan.command.slice(-2)).toEqual(['/dev/sr0', destination]);
      expect(calls).toEqual([{ command: 'ffmpeg', args: plan.command.slice(1) }]);
      expect(result).toEqual({ command: plan.command, exitCode: 0, bytes: 11 });
      expect(sink.lines).toEqual([
        'EVENT=PROGRESS BACKEND=ffmpeg PCT=50.0 ETA=00:23:45 SPEED=2.0x ELAPSED=00:00:00 BYTES_DONE=4096',
        `EVENT=RIP_DONE FILE="${destination}" BYTES=11 STATUS=success`,
        'EVENT=PROGRESS BACKEND=ffmpeg PCT=100.0 ETA=00:00:00 ELAPSED=00:00:00',
      ]);
    });

    it('should report unknown bytes when the destination cannot be read', async () => {
      const destination = path.join(tempDir, 'movie.mp4');
      const { spawn } = fakeSpawn(child => child.finish(0));

      const result = await executor(spawn).execute(ffmpegPlan(destination));

      expect(result).toEqual({ command: expect.any(Array), exitCode: 0, bytes: null });
      expect(sink.lines).toEqual([`EVENT=RIP_DONE FILE="${destination}" BYTES=unknown STATUS=success`]);
      expect(reporter.finalized).toEqual([true]);
    });

    it('should create missing parent directories before spawning', async () => {
      const destination = path.join(tempDir, 'a', 'b', 'movie.mp4');
      let parentExisted = false;
      const { spawn } = fakeSpawn(child => {
        parentExisted = existsSync(path.dirname(destination));
        child.finish(0);
      });

      await executor(spawn).execute(ffmpegPlan(destination));

      expect(parentExisted).toBe(true);
    });

    it('should deliver every line from both streams with their stream name', async () => {
      const { spawn } = fakeSpawn(child => {
        child.stdout.write('out-1\nout-2\n');
        child.stderr.write('err-1\n');
        child.emit('exit', 0, null);
        setTimeout(() => {
          child.stderr.end('err-2\n');
          child.stdout.end('out-3\n');
        }, 30);
      });

      await executor(spawn).execute(ffmpegPlan(path.join(tempDir, 'movie.mp4')));

      expect(reporter.lines.filter(([stream]) => stream === 'stdout')).toEqual([
        ['stdout', 'out-1'], ['stdout', 'out-2'], ['stdout', 'out-3'],
      ]);
      expect(reporter.lines.filter(([stream]) => stream === 'stderr')).toEqual([
        ['stderr', 'err-1'], ['stderr', 'err-2'],
      ]);
    });

    it('should poll the reporter while the process is quiet', async () => {
      const { spawn } = fakeSpawn(child => {
        setTimeout(() => child.finish(0), 60);
      });

      await executor(spawn).execute(ffmpegPlan(path.join(tempDir, 'movie.mp4')));

      expect(reporter.idleCount).toBeGreaterThan(0);
    });
  });

  describe('failures', () => {
    it('should map a non-zero exit status', async () => {
      const destination = path.join(tempDir, 'movie.mp4');
      const { spawn } = fakeSpawn(child => child.finish(1));

      const error = await captureError(executor(spawn).execute(ffmpegPlan(destination)));

      expect(error.exitCode).toBe(2);
      expect(error.reason).toBe('subprocess-exit-1');
      expect(error.message).toBe('ffmpeg exited with status 1');
      expect(sink.lines).toEqual([
        `EVENT=RIP_FAILED FILE="${destination}" EXIT_CODE=2 REASON="subprocess-exit-1"`,
      ]);
      expect(reporter.finalized).toEqual([false]);
    });

    it('should map a missing tool', async () => {
      const destination = path.join(tempDir, 'movie.mp4');
      const { spawn } = fakeSpawn(child => {
        child.emit('error', Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' }));
      });

      const error = await captureError(executor(spawn).execute(ffmpegPlan(destination)));

      expect(error.reason).toBe('tool-not-found');
      expect(error.message).toBe('Ripping tool not found: ffmpeg');
      expect(sink.lines).toEqual([
        `EVENT=RIP_FAILED FILE="${destination}" EXIT_CODE=2 REASON="tool-not-found"`,
      ]);
    });

    it('should map a permission error', async () => {
      const { spawn } = fakeSpawn(child => {
        child.emit('error', Object.assign(new Error('spawn ffmpeg EACCES'), { code: 'EACCES' }));
      });

      const error = await captureError(executor(spawn).execute(ffmpegPlan(path.join(tempDir, 'movie.mp4'))));

      expect(error.reason).toBe('permission-denied');
      expect(error.message).toBe('Permission denied while running ffmpeg: spawn ffmpeg EACCES');
      expect(reporter.finalized).toEqual([false]);
    });

    it('should map termination by a signal', async () => {
      const { spawn } = fakeSpawn(child => child.finish(null, 'SIGKILL'));

      const error = await captureError(executor(spawn).execute(ffmpegPlan(path.join(tempDir, 'movie.mp4'))));

      expect(error.reason).toBe('subprocess-signal-SIGKILL');
      expect(error.exitCode).toBe(2);
    });

    it('should use the OS error text for other spawn errors', async () => {
      const destination = path.join(tempDir, 'movie.mp4');
      const spawn: SpawnFn = () => {
        throw new Error('too many open files');
      };

      const error = await captureError(executor(spawn).execute(ffmpegPlan(destination)));

      expect(error.reason).toBe('too many open files');
      expect(error.message).toBe('Rip failed: too many open files');
      expect(sink.lines).toEqual([
        `EVENT=RIP_FAILED FILE="${destination}" EXIT_CODE=2 REASON="too many open files"`,
      ]);
    });

    it('should fail without spawning when the parent directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'not-a-dir');
      await fs.writeFile(blocker, 'file');
      const { spawn, calls } = fakeSpawn(child => child.finish(0));

      const error = await captureError(executor(spawn).execute(ffmpegPlan(path.join(blocker, 'movie.mp4'))));

      expect(error.failure.kind).toBe('io-error');
      expect(error.exitCode).toBe(2);
      expect(calls).toEqual([]);
      expect(sink.named('RIP_FAILED')).toHaveLength(1);
      expect(reporter.finalized).toEqual([]);
    });
  });
});
