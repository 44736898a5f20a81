import { join } from 'node:path';
import { homedir } from 'node:os';
import type { ConfigSources, RipConfig } from './types.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../rip/executor.js';
import { DEFAULT_SAMPLE_INTERVAL_MS } from '../progress/dvdbackup-reporter.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: RipConfig = {
  outputDirectory: '~/Videos',
  dryRun: false,
  compression: false,
  naming: {
    separator: '_',
    lowercase: false,
  },
  progress: {
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    sampleIntervalMs: DEFAULT_SAMPLE_INTERVAL_MS,
  },
  debug: false,
};

export function defaultConfigSources(): ConfigSources {
  return {
    localPath: './disc-rip.json',
    userPath: join(homedir(), '.config', 'disc-rip', 'config.json'),
  };
}
