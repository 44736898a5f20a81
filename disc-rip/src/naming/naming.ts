import path from 'node:path';
import type { ClassificationResult, DestinationFactory, TitleInfo } from '../rip/types.js';

export interface NamingOptions {
  separator?: string;
  lowercase?: boolean;
}

/** The parts of the configuration that decide where rips land */
export interface OutputLayout {
  outputDirectory: string;
  naming: NamingOptions;
}

const FALLBACK_NAME = 'untitled';
const FALLBACK_SEPARATOR = '_';
const SAFE_CHAR = /^[A-Za-z0-9]$/;

/** Decompose accents and drop everything outside ASCII */
function toAscii(value: string): string {
  return value.normalize('NFKD').replace(/[^\x00-\x7f]/g, '');
}

function normalizeSeparator(separator: string | undefined): string {
  for (const char of toAscii(separator ?? '')) {
    if (SAFE_CHAR.test(char) || char === '-' || char === '_') {
      return char;
    }
  }
  return FALLBACK_SEPARATOR;
}

function trimChar(value: string, char: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && value[start] === char) start++;
  while (end > start && value[end - 1] === char) end--;
  return value.slice(start, end);
}

/**
 * Make a string safe to use as one path component.
 *
 * Runs of anything other than ASCII letters and digits collapse into a single
 * separator, which is then trimmed from both ends. An empty result becomes "untitled".
 */
export function sanitizeComponent(value: string, options: NamingOptions = {}): string {
  const separator = normalizeSeparator(options.separator);
  let sanitized = '';
  let previousWasSeparator = false;

  for (const char of toAscii(value)) {
    if (SAFE_CHAR.test(char)) {
      sanitized += char;
      previousWasSeparator = false;
    } else if (!previousWasSeparator) {
      sanitized += separator;
      previousWasSeparator = true;
    }
  }

  const result = trimChar(sanitized, separator) || FALLBACK_NAME;
  return options.lowercase ? result.toLowerCase() : result;
}

/**
 * <output>/<title>.mp4
 */
export function movieOutputPath(title: TitleInfo, layout: OutputLayout): string {
  return path.join(layout.outputDirectory, `${sanitizeComponent(title.label, layout.naming)}.mp4`);
}

/**
 * <output>/<series>/<series>-<code>_<title>.mp4
 */
export function seriesOutputPath(
  seriesLabel: string,
  title: TitleInfo,
  episodeCode: string,
  layout: OutputLayout
): string {
  const series = sanitizeComponent(seriesLabel, layout.naming);
  const episode = sanitizeComponent(title.label, layout.naming);
  return path.join(layout.outputDirectory, series, `${series}-${episodeCode}_${episode}.mp4`);
}

/**
 * Destination factory for a classified disc. Series titles without an episode code are rejected.
 */
export function createDestinationFactory(
  discLabel: string,
  classification: ClassificationResult,
  layout: OutputLayout
): DestinationFactory {
  return (title, episodeCode) => {
    if (classification.discType === 'movie') {
      return movieOutputPath(title, layout);
    }
    if (!episodeCode) {
      throw new Error('Series classification requires episode codes for destination planning');
    }
    return seriesOutputPath(discLabel, title, episodeCode, layout);
  };
}
