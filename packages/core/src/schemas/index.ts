// packages/core/src/schemas/index.ts

// Search schemas (request-scoped search, related concepts, closest match)
export * from './search-schemas';

// Graph schemas (persisted knowledge graph)
export * from './graph-schemas';
