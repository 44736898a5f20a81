import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ClassificationResult } from '../rip/types.js';

const TitleSchema = z.object({
  label: z.string(),
  durationSeconds: z.number().nonnegative(),
  chapters: z.array(z.number().nonnegative()).default([]),
});

/**
 * A classified disc as produced by the inspection step
 */
export const ManifestSchema = z
  .object({
    label: z.string().min(1),
    discType: z.enum(['movie', 'series']),
    titles: z.array(TitleSchema),
    episodeCodes: z.array(z.string().min(1)).default([]),
  })
  .superRefine((manifest, ctx) => {
    const { titles, episodeCodes, discType } = manifest;
    if (episodeCodes.length > 0 && episodeCodes.length !== titles.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['episodeCodes'],
        message: `must align with titles (${episodeCodes.length} codes for ${titles.length} titles)`,
      });
    }
    if (discType === 'series' && titles.length > 0 && episodeCodes.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['episodeCodes'],
        message: 'series discs need one episode code per title',
      });
    }
  });

export interface DiscManifest {
  label: string;
  classification: ClassificationResult;
}

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ManifestError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already parsed manifest document
 */
export function parseManifest(value: unknown, source: string): DiscManifest {
  const result = ManifestSchema.safeParse(value);
  if (!result.success) {
    throw new ManifestError(`Invalid manifest ${source}: ${describeIssues(result.error)}`);
  }

  const { label, discType, titles, episodeCodes } = result.data;
  return {
    label,
    classification: { discType, episodes: titles, episodeCodes },
  };
}

/**
 * Read and validate a JSON manifest file
 */
export async function loadManifest(path: string): Promise<DiscManifest> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ManifestError(`Manifest not found: ${path}`);
    }
    throw new ManifestError(
      `Cannot read manifest ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ManifestError(
      `Invalid manifest ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseManifest(parsed, path);
}
