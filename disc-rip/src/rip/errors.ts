/** Exit code carried by every error raised while executing a rip plan */
export const RIP_FAILED_EXIT_CODE = 2;

/**
 * Ways an execution can fail once a plan exists
 */
export type RipFailure =
  | { kind: 'destination-exists'; destination: string }
  | { kind: 'tool-not-found'; tool: string }
  | { kind: 'permission-denied'; tool: string; detail: string }
  | { kind: 'non-zero-exit'; tool: string; code: number }
  | { kind: 'signal'; tool: string; signal: string }
  | { kind: 'io-error'; detail: string };

/**
 * Machine-readable reason tag for RIP_FAILED / RIP_GUARD events
 */
export function failureReason(failure: RipFailure): string {
  switch (failure.kind) {
    case 'destination-exists':
      return 'destination-exists';
    case 'tool-not-found':
      return 'tool-not-found';
    case 'permission-denied':
      return 'permission-denied';
    case 'non-zero-exit':
      return `subprocess-exit-${failure.code}`;
    case 'signal':
      return `subprocess-signal-${failure.signal}`;
    case 'io-error':
      return failure.detail;
  }
}

/**
 * Message safe to print to a user as-is
 */
export function failureMessage(failure: RipFailure): string {
  switch (failure.kind) {
    case 'destination-exists':
      return `Destination already exists: ${failure.destination}`;
    case 'tool-not-found':
      return `Ripping tool not found: ${failure.tool}`;
    case 'permission-denied':
      return `Permission denied while running ${failure.tool}: ${failure.detail}`;
    case 'non-zero-exit':
      return `${failure.tool} exited with status ${failure.code}`;
    case 'signal':
      return `${failure.tool} was terminated by signal ${failure.signal}`;
    case 'io-error':
      return `Rip failed: ${failure.detail}`;
  }
}

/**
 * Raised by the executor for every failed execution
 */
export class RipExecutionError extends Error {
  readonly exitCode: number = RIP_FAILED_EXIT_CODE;
  readonly reason: string;

  constructor(
    public readonly failure: RipFailure,
    public readonly destination: string
  ) {
    super(failureMessage(failure));
    this.name = 'RipExecutionError';
    this.reason = failureReason(failure);
  }
}

/**
 * Map an error thrown while spawning or talking to the tool to a failure kind
 */
export function failureFromSystemError(error: unknown, tool: string): RipFailure {
  const detail = error instanceof Error ? error.message : String(error);
  const code = error instanceof Error && 'code' in error ? error.code : undefined;

  if (code === 'ENOENT') {
    return { kind: 'tool-not-found', tool };
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return { kind: 'permission-denied', tool, detail };
  }
  return { kind: 'io-error', detail };
}
