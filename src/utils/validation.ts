import { z } from 'zod';
import { isLanguageFamily } from '../services/parser/language';
import type { LanguageFamily } from '../services/parser/parser.types';
import { UNIQUE_ATTRIBUTES, type SearchFilters } from '../services/vectorIndex/vectorIndex.types';
import { isCalendarDate } from './dates';

const isoDate = z.string().refine(isCalendarDate, 'Expected a real YYYY-MM-DD date');

/** Blank query parameters count as absent. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const optionalDate = optionalText.pipe(isoDate.optional());

/** Anything but a positive integer means "use the configured default". */
const lenientTopK = z.unknown().transform((value) => {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
});

const languageFamily = z.custom<LanguageFamily>(
  (value) => typeof value === 'string' && isLanguageFamily(value),
  'Unknown language family'
);

export const filterQuerySchema = z.object({
  author: optionalText,
  region: optionalText,
  date_from: optionalDate,
  date_to: optionalDate,
  file_name: optionalText,
  language: optionalText.pipe(languageFamily.optional()),
});

export const retrieveQuerySchema = filterQuerySchema.extend({
  query: z.string().trim().min(1, 'query is required'),
  top_k: lenientTopK,
});

export const ragQuerySchema = retrieveQuerySchema.extend({
  subject: optionalText,
});

export const stanceBodySchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  evidence: z.string().trim().min(1, 'evidence is required'),
  author: z.string().trim().min(1).optional(),
});

export const insertBodySchema = z.object({
  file_path: z.string().trim().min(1, 'file_path is required'),
  author: z.string().trim().min(1, 'author is required'),
  region: z.string().trim().min(1).nullish(),
  date: isoDate.nullish(),
});

export const deleteBodySchema = z.object({
  file_name: z.string().trim().min(1, 'file_name is required'),
});

export const uniqueQuerySchema = z.object({
  attribute: z.enum(UNIQUE_ATTRIBUTES),
});

export function toSearchFilters(query: z.infer<typeof filterQuerySchema>): SearchFilters {
  return {
    author: query.author,
    region: query.region,
    documentId: query.file_name,
    language: query.language,
    dateFrom: query.date_from,
    dateTo: query.date_to,
  };
}
