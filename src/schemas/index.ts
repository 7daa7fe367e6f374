import { z } from 'zod';

const isoDate = z
  .string()
  .trim()
  .refine((value) => !isNaN(new Date(value).getTime()), { message: 'must be an ISO-8601 date' })
  .transform((value) => new Date(value));

const optionalBoolean = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === true || value === 'true'));

/**
 * GET /api/search
 */
export const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required').max(500),
  limit: z.coerce.number().int().optional(),
  useAi: optionalBoolean,
  minSimilarity: z.coerce.number().min(0).max(1).optional(),
});

export const KeywordQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required').max(500),
  limit: z.coerce.number().int().optional(),
});

export const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

export const ArticleListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
  source: z.string().trim().min(1).optional(),
});

export const SummaryRequestSchema = z.object({
  kind: z.string().trim().min(1).default('comprehensive'),
  force: optionalBoolean,
});

export const MultiAnalysisBodySchema = z.object({
  articleIds: z.array(z.string().trim().min(1)),
  focus: z.string().max(500).optional().nullable(),
  force: z.boolean().optional(),
});

export const CleanupFiltersSchema = z.object({
  beforeDate: isoDate.optional(),
  sources: z.array(z.string()).optional(),
});

export const DeleteArticlesBodySchema = CleanupFiltersSchema.extend({
  deleteSummaries: z.boolean().default(true),
  deleteFromVectorStore: z.boolean().default(true),
  confirmAll: z.boolean().default(false),
});

export const IngestionRunBodySchema = z.object({
  wait: z.boolean().default(false),
});

export const FeedCreateSchema = z.object({
  name: z.string().trim().min(1).max(200),
  url: z.string().trim().url(),
  enabled: z.boolean().optional(),
});

export const FeedUpdateSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    url: z.string().trim().url().optional(),
    enabled: z.boolean().optional(),
  })
  .refine((update) => Object.values(update).some((value) => value !== undefined), {
    message: 'at least one of name, url or enabled is required',
  });

export const TagCreateSchema = z.object({
  name: z.string().trim().min(1).max(50),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'color must be a hex value like #1a2b3c')
    .optional()
    .nullable(),
});

export const FeedTagsSchema = z.object({
  tagIds: z.array(z.string().min(1)),
});

export const ReadingListAddSchema = z.object({
  articleId: z.string().trim().min(1),
  notes: z.string().max(2000).optional().nullable(),
});

export const ReadingListNotesSchema = z.object({
  notes: z.string().max(2000).nullable(),
});

/**
 * POST /api/research and /api/research/plan
 */
export const ResearchQueryBodySchema = z.object({
  query: z.string().trim().min(1, 'query is required').max(1000),
});

export const ExecutePlanBodySchema = z.object({
  query: z.string().trim().max(1000).optional(),
  steps: z
    .array(
      z.object({
        step: z.number().int().min(1).optional(),
        tool: z.string().trim().min(1),
        description: z.string().default(''),
        params: z.record(z.unknown()).default({}),
      })
    )
    .min(1, 'steps must not be empty')
    .max(10),
});

export type DeleteArticlesBody = z.infer<typeof DeleteArticlesBodySchema>;
