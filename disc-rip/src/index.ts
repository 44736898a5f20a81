#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { discRip, EXIT_UNEXPECTED_ERROR } from './disc-rip.js';
import { logger } from './utils/logger.js';

interface RipFlags {
  manifest: string;
  config?: string;
  'dry-run': boolean;
  debug: boolean;
}

const DEFAULT_DEVICE = '/dev/sr0';

// Define the rip command
const ripCommand = buildCommand({
  docs: {
    brief: 'Rip the titles of a classified disc with dvdbackup or ffmpeg, reporting progress as KEY=VALUE events'
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: `Optical drive device (default: ${DEFAULT_DEVICE})`,
          parse: String,
          placeholder: 'device',
          optional: true
        }
      ]
    },
    flags: {
      manifest: {
        kind: 'parsed',
        brief: 'Path to the disc manifest JSON (label, disc type, titles, episode codes)',
        parse: String
      },
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      'dry-run': {
        kind: 'boolean',
        brief: 'Print the rip commands without running them',
        default: false
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      m: 'manifest',
      c: 'config',
      n: 'dry-run',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: RipFlags, device?: string): Promise<void> {
    try {
      process.exitCode = await discRip({
        device: device ?? DEFAULT_DEVICE,
        manifestPath: flags.manifest,
        configPath: flags.config,
        dryRun: flags['dry-run'],
        debug: flags.debug
      });
    } catch (error) {
      if (logger.isDebugEnabled()) {
        logger.debug('Unhandled exception encountered', error);
      }
      console.error('Error: An unexpected error occurred. Run with --debug for details.');
      process.exitCode = EXIT_UNEXPECTED_ERROR;
    }
  }
});

// Build the application
const app = buildApplication(ripCommand, {
  name: 'disc-rip',
  versionInfo: {
    currentVersion: '0.1.0'
  }
});

// Run the application
await run(app, process.argv.slice(2), { process });
