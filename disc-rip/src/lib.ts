export { discRip, runRipPlans, EXIT_SUCCESS, EXIT_DISC_NOT_DETECTED, EXIT_RIP_FAILED, EXIT_UNEXPECTED_ERROR } from './disc-rip.js';
export type { DiscRipOptions, PlanRunner, RunPlansOptions } from './disc-rip.js';

export { buildRipPlan, backendOf, selectBackend, BACKEND_PREFERENCE } from './rip/plan-builder.js';
export type { PlanOptions } from './rip/plan-builder.js';
export { RipExecutor, DEFAULT_POLL_INTERVAL_MS } from './rip/executor.js';
export type { RipExecutorOptions, SpawnFn, ChildProcessLike } from './rip/executor.js';
export { ripDisc } from './rip/orchestrator.js';
export { RipExecutionError, RIP_FAILED_EXIT_CODE, failureMessage, failureReason } from './rip/errors.js';
export type { RipFailure } from './rip/errors.js';
export { compressionPlanEvent, handbrakeCommand, compressionOutputPath } from './rip/compression.js';
export type {
  Backend,
  ClassificationResult,
  DestinationFactory,
  DiscType,
  RipPlan,
  RipResult,
  TitleInfo,
  ToolResolver,
} from './rip/types.js';

export { FfmpegProgressReporter, parseSpeed } from './progress/ffmpeg-reporter.js';
export { DvdbackupProgressReporter } from './progress/dvdbackup-reporter.js';
export { createProgressReporter, SilentProgressReporter } from './progress/reporter-factory.js';
export type { ReporterDependencies, ReporterFactory } from './progress/reporter-factory.js';
export type { ProgressReporter, StreamName, Clock } from './progress/types.js';
export { probeVolumeSize, parseVolumeSize } from './progress/volume-probe.js';

export { LoggerEventSink, CollectingEventSink, formatEvent, quoted } from './events/event-sink.js';
export type { EventSink, EventValue } from './events/event-sink.js';

export { sanitizeComponent, movieOutputPath, seriesOutputPath, createDestinationFactory } from './naming/naming.js';
export type { NamingOptions, OutputLayout } from './naming/naming.js';
export { loadManifest, parseManifest, ManifestError, ManifestSchema } from './manifest/manifest.js';
export type { DiscManifest } from './manifest/manifest.js';
export { loadConfig } from './config/config.js';
export type { RipConfig, ConfigSources } from './config/types.js';
export { findExecutable } from './utils/tools.js';
