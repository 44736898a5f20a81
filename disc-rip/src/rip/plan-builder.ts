import path from 'node:path';
import type { Backend, RipPlan, TitleInfo, ToolResolver } from './types.js';
import { findExecutable } from '../utils/tools.js';

export interface PlanOptions {
  dryRun?: boolean;
  resolveTool?: ToolResolver;
}

/** Preference order when more than one backend is installed */
export const BACKEND_PREFERENCE: readonly Backend[] = ['dvdbackup', 'ffmpeg'];

/**
 * Name passed to dvdbackup -n: destination stem, then title label, then "title"
 */
export function dvdbackupLabel(destination: string, title: TitleInfo): string {
  const stem = path.parse(destination).name;
  return stem || title.label || 'title';
}

function dvdbackupCommand(device: string, title: TitleInfo, destination: string): string[] {
  return [
    'dvdbackup',
    '-i', device,
    '-o', path.dirname(destination),
    '-n', dvdbackupLabel(destination, title),
    '-F',
  ];
}

/**
 * -progress pipe:2 makes ffmpeg write key=value progress blocks on stderr
 */
function ffmpegCommand(device: string, destination: string): string[] {
  return [
    'ffmpeg',
    '-hide_banner',
    '-nostats',
    '-loglevel', 'error',
    '-progress', 'pipe:2',
    '-i', device,
    destination,
  ];
}

/**
 * Pick the first installed backend
 */
export function selectBackend(resolveTool: ToolResolver): Backend {
  for (const backend of BACKEND_PREFERENCE) {
    if (resolveTool(backend)) {
      return backend;
    }
  }
  throw new Error('No supported ripping tools found on PATH');
}

/**
 * Identify the backend a plan's command runs, or null for anything else
 */
export function backendOf(plan: RipPlan): Backend | null {
  const tool = path.basename(plan.command[0] ?? '');
  return BACKEND_PREFERENCE.find(backend => backend === tool) ?? null;
}

/**
 * Build the rip plan for one title. Runs nothing; fails when no backend is installed.
 */
export function buildRipPlan(
  device: string,
  title: TitleInfo,
  destination: string,
  options: PlanOptions = {}
): RipPlan {
  const resolveTool = options.resolveTool ?? findExecutable;
  const backend = selectBackend(resolveTool);

  const command = backend === 'dvdbackup'
    ? dvdbackupCommand(device, title, destination)
    : ffmpegCommand(device, destination);

  return Object.freeze({
    device,
    title,
    destination,
    command: Object.freeze(command),
    willExecute: !options.dryRun,
  });
}
