import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan applied when the sink first connects:
 * - unique: { jobKey: 1 } so redelivered jobs upsert instead of duplicating
 * - { topic: 1, partitionId: 1 } for per-topic reads
 */
export const mongoIndexes: {
  recordCollection: { keys: IndexSpecification; options: CreateIndexesOptions }[];
} = {
  recordCollection: [
    { keys: { jobKey: 1 }, options: { unique: true } },
    { keys: { topic: 1, partitionId: 1 }, options: {} }
  ]
};
