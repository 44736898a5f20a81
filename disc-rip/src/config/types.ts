/**
 * Configuration types for disc-rip
 */

export interface RipConfig {
  outputDirectory: string;
  dryRun: boolean;
  compression: boolean;
  naming: NamingConfig;
  progress: ProgressConfig;
  debug: boolean;
}

export interface NamingConfig {
  separator: string;
  lowercase: boolean;
}

export interface ProgressConfig {
  /** How long the executor waits for a line before polling the reporter */
  pollIntervalMs: number;
  /** Minimum gap between dvdbackup output-size samples */
  sampleIntervalMs: number;
}

/** Where the implicit configuration layers are read from */
export interface ConfigSources {
  localPath: string;
  userPath: string;
}
