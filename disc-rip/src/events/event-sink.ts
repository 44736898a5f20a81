import { logger } from '../utils/logger.js';

/**
 * Receives structured rip events as single KEY=VALUE lines.
 * Only the task supervising an execution writes to it.
 */
export interface EventSink {
  emit(line: string): void;
}

export type EventValue = string | number | boolean | undefined;

/**
 * Wrap a value in double quotes, escaping embedded quotes and backslashes
 */
export function quoted(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Format an event line: EVENT=<name> followed by each defined field in insertion order
 */
export function formatEvent(name: string, fields: Record<string, EventValue> = {}): string {
  const parts = [`EVENT=${name}`];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${String(value)}`);
  }
  return parts.join(' ');
}

/** Forwards events to the process-wide logger */
export class LoggerEventSink implements EventSink {
  emit(line: string): void {
    logger.event(line);
  }
}

/** Keeps every event in memory */
export class CollectingEventSink implements EventSink {
  readonly lines: string[] = [];

  emit(line: string): void {
    this.lines.push(line);
  }

  /** Events whose EVENT= tag matches name */
  named(name: string): string[] {
    const prefix = `EVENT=${name}`;
    return this.lines.filter(line => line === prefix || line.startsWith(`${prefix} `));
  }
}
