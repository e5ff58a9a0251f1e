import { z } from 'zod';

// --- Raw dataset records ---

/**
 * Text fields accept anything String() renders faithfully.
 */
const CoercibleTextSchema = z
  .union([z.string(), z.number().finite(), z.boolean()])
  .transform((value) => String(value).trim());

/**
 * Comma-separated facet list, e.g. "NSCLC, SCLC". Case is preserved.
 */
const FacetListSchema = z
  .string()
  .nullish()
  .transform((value) => splitFacetList(value));

export const RawRecordSchema = z
  .object({
    prompt: CoercibleTextSchema,
    completion: CoercibleTextSchema,
    cancer_type: FacetListSchema,
    genes: FacetListSchema,
  })
  .passthrough();

export function splitFacetList(value: string | null | undefined): Set<string> {
  const values = new Set<string>();
  if (!value) return values;
  for (const part of value.split(',')) {
    const trimmed = part.trim();
    if (trimmed.length > 0) values.add(trimmed);
  }
  return values;
}
