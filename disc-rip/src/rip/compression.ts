import path from 'node:path';
import { formatEvent, quoted } from '../events/event-sink.js';
import { shellJoin } from '../utils/shell.js';

export const HANDBRAKE_PRESET = 'Fast 1080p30';

/**
 * movie.mp4 -> movie-compressed.mp4, next to the source
 */
export function compressionOutputPath(source: string): string {
  const { dir, name, ext } = path.parse(source);
  return path.join(dir, `${name}-compressed${ext}`);
}

export function handbrakeCommand(source: string): string[] {
  return ['HandBrakeCLI', '-i', source, '-o', compressionOutputPath(source), '--preset', HANDBRAKE_PRESET];
}

/**
 * COMPRESS_PLAN event for a ripped (or, on dry runs, planned) destination.
 * Compression itself is left to the user.
 */
export function compressionPlanEvent(source: string, executed: boolean): string {
  return formatEvent('COMPRESS_PLAN', {
    STATUS: executed ? 'ready' : 'dry-run',
    SOURCE: quoted(source),
    OUTPUT: quoted(compressionOutputPath(source)),
    COMMAND: quoted(shellJoin(handbrakeCommand(source))),
  });
}
