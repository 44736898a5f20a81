import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/** Bytes per DVD sector */
export const SECTOR_SIZE = 2048;

const PROBE_TIMEOUT = 30000;

/** Returns the expected size of a disc in bytes, or null if unknown */
export type VolumeProbe = (device: string) => Promise<number | null>;

/**
 * Extract the byte size from disc-info output containing "Volume size is: <sectors>"
 */
export function parseVolumeSize(output: string): number | null {
  const match = output.match(/Volume size is:\s*(\d+)/);
  if (!match) return null;
  return parseInt(match[1], 10) * SECTOR_SIZE;
}

/**
 * Ask isoinfo for the disc's volume size
 */
export const probeVolumeSize: VolumeProbe = async (device) => {
  try {
    const { stdout } = await execFileAsync('isoinfo', ['-d', '-i', device], {
      timeout: PROBE_TIMEOUT,
      encoding: 'utf-8',
    });
    const bytes = parseVolumeSize(stdout);
    if (bytes === null) {
      logger.debug(`isoinfo reported no volume size for ${device}`);
    }
    return bytes;
  } catch (error) {
    logger.debug(`Volume probe failed for ${device}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
};
