// packages/core/src/schemas/graph-schemas.ts
import { z } from 'zod';

// --- Graph Nodes ---
export const ConceptKindSchema = z.enum(['cancer_type', 'gene', 'term']);

export const DocumentNodeSchema = z.object({
  kind: z.literal('document'),
  key: z.string().min(1),
  documentId: z.number().int().nonnegative(),
});

export const ConceptNodeSchema = z.object({
  kind: ConceptKindSchema,
  key: z.string().min(1),
  label: z.string(),
});

export const GraphNodeSchema = z.union([DocumentNodeSchema, ConceptNodeSchema]);

// --- Graph Edges ---
export const EdgeKindSchema = z.enum(['cooccurs', 'about', 'involves', 'mentions']);

export const GraphEdgeSchema = z.object({
  kind: EdgeKindSchema,
  source: z.string().min(1),
  target: z.string().min(1),
  weight: z.number().int().min(1),
});

// --- Persisted Graph ---
export const GRAPH_FORMAT_VERSION = 1;

export const SerializedGraphSchema = z.object({
  version: z.literal(GRAPH_FORMAT_VERSION),
  fingerprint: z.string().nullable(),
  nodes: z.array(GraphNodeSchema),
  edges: z.array(GraphEdgeSchema),
});
export type SerializedGraph = z.infer<typeof SerializedGraphSchema>;
