/**
 * Drops `undefined` members recursively; neither Firestore nor the
 * Realtime Database accepts them.
 */
export function pruneUndefinedDeep(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map(item => pruneUndefinedDeep(item))
      .filter(item => item !== undefined);
  }

  if (typeof value === 'object') {
    if (value instanceof Date) {
      return value;
    }

    const record: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      if (child === undefined) {
        continue;
      }
      const pruned = pruneUndefinedDeep(child);
      if (pruned !== undefined) {
        record[key] = pruned;
      }
    }
    return record;
  }

  return value;
}
