/**
 * Split a list into consecutive chunks whose summed `JSON.stringify` UTF-8
 * size stays within `maxBytes`. Order is preserved and no chunk is empty; an
 * item larger than `maxBytes` on its own ends up alone in a chunk.
 */
export function splitJsonList<T>(items: readonly T[], maxBytes: number): T[][] {
  const chunks: T[][] = [];
  let current: T[] = [];
  let currentSize = 0;

  for (const item of items) {
    const size = Buffer.byteLength(JSON.stringify(item), 'utf8');

    if (current.length > 0 && currentSize + size > maxBytes) {
      chunks.push(current);
      current = [];
      currentSize = 0;
    }

    current.push(item);
    currentSize += size;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

/** Fixed-count chunking, used where the API caps items rather than bytes. */
export function chunkByCount<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
