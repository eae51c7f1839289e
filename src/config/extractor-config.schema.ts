import { z } from 'zod';
import { DEFAULT_DATE_FORMATS } from '../time-window/date-parsing';
import { DEFAULT_TIME_INTERVAL_OFFSET } from '../query/request-payload';

export const DEFAULT_API_URL = 'https://my.meteoblue.com/dataset/query';

const domainGroupsSchema = z.record(
  z.string().min(1),
  z.union([z.string(), z.array(z.string())]),
);

const depthBandSchema = z.object({
  startDepth: z.number().int().min(0),
  endDepth: z.number().int().positive(),
});

/**
 * Shape of config/extractor.json (after environment overrides)
 */
export const extractorConfigSchema = z.object({
  apiKey: z.string().trim().min(1, 'An API key is required (METEOBLUE_API_KEY)'),
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  input: z.object({
    directory: z.string().default('.'),
    filename: z.string().min(1),
    sheetName: z.string().optional(),
  }),
  output: z.object({
    directory: z.string().default('output'),
  }),
  columns: z.object({
    id: z.string().min(1),
    latitude: z.string().min(1),
    longitude: z.string().min(1),
    countryCode: z.string().trim().optional(),
    dates: z.union([z.string(), z.array(z.string())]),
  }),
  fallbackCountryCode: z.string().trim().min(1).optional(),
  offsets: z
    .object({
      startDays: z.number().int().default(0),
      endDays: z.number().int().default(0),
    })
    .default({}),
  dateFormats: z
    .array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_DATE_FORMATS]),
  domains: z.object({
    precipitation: domainGroupsSchema,
    temperature: domainGroupsSchema,
    wind: domainGroupsSchema,
  }),
  soilDepthBands: z.array(depthBandSchema).min(1).optional(),
  categories: z
    .array(z.enum(['weather', 'soil']))
    .min(1)
    .default(['weather', 'soil']),
  queryFiles: z
    .object({
      weather: z.string().min(1).optional(),
      soil: z.string().min(1).optional(),
    })
    .default({}),
  concurrency: z.number().int().min(1).max(16).default(1),
  retryDelayMs: z.number().int().min(0).default(10000),
  timeIntervalOffset: z
    .string()
    .regex(/^[+-]\d{2}:\d{2}$/)
    .default(DEFAULT_TIME_INTERVAL_OFFSET),
  dataPointPolicy: z.enum(['first', 'strict']).default('first'),
});

export type ExtractorConfigInput = z.input<typeof extractorConfigSchema>;
export type ExtractorConfig = z.output<typeof extractorConfigSchema>;
