// packages/core/src/schemas/search-schemas.ts
import { z } from 'zod';

// --- Category Filters ---
export const CategoryFiltersSchema = z.object({
  cancer_type: z.array(z.string()).optional(),
  genes: z.array(z.string()).optional(),
});

// --- Ranked Search ---
/**
 * Request-scoped search parameters. Pagination and active filters travel
 * with every call instead of living in session state.
 */
export const SearchRequestSchema = z.object({
  query: z.string(),
  minScore: z.number().min(0).default(0),
  keywordFilters: z.array(z.string()).default([]),
  categoryFilters: CategoryFiltersSchema.default({}),
  limit: z.number().int().positive().optional(),
  offset: z.number().int().nonnegative().default(0),
});
export type SearchRequest = z.input<typeof SearchRequestSchema>;
export type ParsedSearchRequest = z.output<typeof SearchRequestSchema>;

// --- Related Concepts ---
export const RelatedConceptsRequestSchema = z.object({
  query: z.string(),
  topN: z.number().int().nonnegative().default(10),
});
export type RelatedConceptsRequest = z.input<typeof RelatedConceptsRequestSchema>;

// --- Closest Match ---
export const ClosestMatchRequestSchema = z.object({
  question: z.string(),
});
export type ClosestMatchRequest = z.infer<typeof ClosestMatchRequestSchema>;
