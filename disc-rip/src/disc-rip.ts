import { loadConfig, expandHome } from './config/config.js';
import type { ConfigSources, RipConfig } from './config/types.js';
import { LoggerEventSink, formatEvent, quoted, type EventSink } from './events/event-sink.js';
import { loadManifest, ManifestError, type DiscManifest } from './manifest/manifest.js';
import { createDestinationFactory } from './naming/naming.js';
import { compressionPlanEvent } from './rip/compression.js';
import { RipExecutionError, RIP_FAILED_EXIT_CODE } from './rip/errors.js';
import { RipExecutor, type SpawnFn } from './rip/executor.js';
import { ripDisc } from './rip/orchestrator.js';
import type { RipPlan, RipResult, ToolResolver } from './rip/types.js';
import { isReadable } from './utils/fs-utils.js';
import { logger } from './utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_DISC_NOT_DETECTED = 1;
export const EXIT_RIP_FAILED = RIP_FAILED_EXIT_CODE;
export const EXIT_UNEXPECTED_ERROR = 3;

export interface DiscRipOptions {
  device: string;
  manifestPath: string;
  configPath?: string;
  dryRun?: boolean;
  debug?: boolean;
  /** Overrides where the implicit config files are looked up */
  configSources?: ConfigSources;
  sink?: EventSink;
  resolveTool?: ToolResolver;
  spawn?: SpawnFn;
  print?: (line: string) => void;
  printError?: (message: string) => void;
}

/** Anything that can run a single plan */
export interface PlanRunner {
  execute(plan: RipPlan): Promise<RipResult | null>;
}

export interface RunPlansOptions {
  sink: EventSink;
  compression?: boolean;
  printError?: (message: string) => void;
}

const printErrorLine = (message: string) => console.error(`Error: ${message}`);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run plans one after another. The first failure stops the run and decides the exit code.
 */
export async function runRipPlans(
  plans: readonly RipPlan[],
  runner: PlanRunner,
  options: RunPlansOptions
): Promise<number> {
  const printError = options.printError ?? printErrorLine;

  for (const plan of plans) {
    let result: RipResult | null;
    try {
      result = await runner.execute(plan);
    } catch (error) {
      if (error instanceof RipExecutionError) {
        printError(error.message);
        return error.exitCode;
      }
      printError(`Unexpected ripping failure: ${errorMessage(error)}`);
      return EXIT_UNEXPECTED_ERROR;
    }

    if (options.compression) {
      options.sink.emit(compressionPlanEvent(plan.destination, plan.willExecute && result !== null));
    }
  }

  return EXIT_SUCCESS;
}

function classifiedEvent(manifest: DiscManifest): string {
  return formatEvent('CLASSIFIED', {
    TYPE: manifest.classification.discType,
    EPISODES: manifest.classification.episodes.length,
    LABEL: quoted(manifest.label),
  });
}

function planRips(device: string, manifest: DiscManifest, config: RipConfig, resolveTool?: ToolResolver): RipPlan[] {
  const { classification } = manifest;
  const destinationFactory = createDestinationFactory(manifest.label, classification, config);
  return ripDisc(device, classification, destinationFactory, { dryRun: config.dryRun, resolveTool });
}

/**
 * Main entry point: plan and run the rips for one classified disc.
 * Resolves to the process exit code; only programming errors reject.
 */
export async function discRip(options: DiscRipOptions): Promise<number> {
  const printError = options.printError ?? printErrorLine;
  const sink = options.sink ?? new LoggerEventSink();

  if (options.debug) {
    logger.enableDebug();
  }

  let config: RipConfig;
  try {
    config = await loadConfig(options.configPath, options.configSources);
  } catch (error) {
    printError(errorMessage(error));
    return EXIT_UNEXPECTED_ERROR;
  }

  if (config.debug) {
    logger.enableDebug();
  }
  if (options.dryRun) {
    config = { ...config, dryRun: true };
  }

  const device = expandHome(options.device);
  if (!config.dryRun && !(await isReadable(device))) {
    printError(
      `device path '${device}' not found or unreadable. ` +
        'Check that the disc is inserted and the device path is correct.'
    );
    return EXIT_DISC_NOT_DETECTED;
  }

  let manifest: DiscManifest;
  try {
    manifest = await loadManifest(options.manifestPath);
  } catch (error) {
    if (error instanceof ManifestError) {
      printError(error.message);
      return EXIT_DISC_NOT_DETECTED;
    }
    throw error;
  }

  sink.emit(classifiedEvent(manifest));

  let plans: RipPlan[];
  try {
    plans = planRips(device, manifest, config, options.resolveTool);
  } catch (error) {
    printError(`Failed to prepare rip plan: ${errorMessage(error)}`);
    return EXIT_UNEXPECTED_ERROR;
  }
  logger.debug(`Planned ${plans.length} rip(s) from ${device}`);

  const executor = new RipExecutor({
    sink,
    spawn: options.spawn,
    print: options.print,
    pollIntervalMs: config.progress.pollIntervalMs,
    sampleIntervalMs: config.progress.sampleIntervalMs,
  });

  const exitCode = await runRipPlans(plans, executor, {
    sink,
    compression: config.compression,
    printError,
  });

  if (exitCode === EXIT_SUCCESS && !config.dryRun && plans.length > 0) {
    logger.success(`Ripped ${plans.length} title(s) to ${config.outputDirectory}`);
  }
  return exitCode;
}
