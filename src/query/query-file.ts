import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../common/errors';
import { QueryBlock } from './query.types';

const aggregationSchema = z.enum(['max', 'min', 'mean', 'sum']);

const codeRequestSchema = z.object({
  code: z.number().int(),
  level: z.string().min(1),
  aggregation: aggregationSchema.optional(),
  startDepth: z.number().int().min(0).optional(),
  endDepth: z.number().int().positive().optional(),
});

export const queryBlockSchema = z.object({
  domain: z.string().min(1),
  gapFillDomain: z.string().nullable().optional(),
  timeResolution: z.enum(['daily', 'hourly']).optional(),
  codes: z.array(codeRequestSchema).min(1),
  transformations: z
    .array(
      z.object({
        type: z.literal('aggregateDaily'),
        aggregation: aggregationSchema,
      }),
    )
    .optional(),
});

/**
 * Load a hand-written list of query blocks, used instead of the built query
 * for every record of a category
 */
export async function loadQueryFile(filePath: string): Promise<QueryBlock[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read query file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'queryFiles',
    );
  }

  const parsed = z.array(queryBlockSchema).min(1).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(
      `Invalid query file ${filePath}: ${issues}`,
      'queryFiles',
    );
  }
  return parsed.data;
}
