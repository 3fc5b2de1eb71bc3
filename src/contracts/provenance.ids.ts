/** Source classifications a ValueSpec may carry. */
export const SOURCE_TYPES = ['measured', 'assumed', 'derived', 'external'] as const;

export type SourceType = typeof SOURCE_TYPES[number];
