/**
 * Types shared by plan building, execution and progress reporting
 */

/** Metadata for a single title found on a disc */
export interface TitleInfo {
  label: string;
  /** Running time in seconds (0 when unknown) */
  durationSeconds: number;
  /** Chapter start offsets in seconds */
  chapters: readonly number[];
}

export type DiscType = 'movie' | 'series';

/**
 * Titles selected for ripping, in rip order.
 * When present, episodeCodes line up one-to-one with episodes.
 */
export interface ClassificationResult {
  discType: DiscType;
  episodes: readonly TitleInfo[];
  episodeCodes: readonly string[];
}

/** External tools that can perform the extraction */
export type Backend = 'dvdbackup' | 'ffmpeg';

/**
 * Immutable description of one title's extraction job.
 * command[0] is the tool name.
 */
export interface RipPlan {
  readonly device: string;
  readonly title: TitleInfo;
  readonly destination: string;
  readonly command: readonly string[];
  readonly willExecute: boolean;
}

/** Returned by the executor when the external tool exits cleanly */
export interface RipResult {
  command: readonly string[];
  exitCode: number;
  /** Size of the destination in bytes, null when it could not be read */
  bytes: number | null;
}

/** Looks up an executable by name, returning its path or null */
export type ToolResolver = (name: string) => string | null;

/** Produces the output path for one title */
export type DestinationFactory = (
  title: TitleInfo,
  episodeCode: string | null,
  index: number
) => string;
