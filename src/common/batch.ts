// Splits id lists so IN (...) clauses stay under driver parameter limits
export const IN_CLAUSE_BATCH_SIZE = 900;

export function chunk<T>(items: readonly T[], size = IN_CLAUSE_BATCH_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function unique<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
