// PostgREST serialises pgvector columns as "[0.1,0.2,...]" strings.
export function parseEmbedding(value: unknown): number[] | null {
  let source: unknown = value;
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
      return null;
    }
    try {
      source = JSON.parse(trimmed);
    } catch {
      return null;
    }
  }
  if (!Array.isArray(source) || source.length === 0) {
    return null;
  }
  const vector: number[] = [];
  for (const item of source) {
    const numeric = typeof item === "number" ? item : Number(item);
    if (!Number.isFinite(numeric)) {
      return null;
    }
    vector.push(numeric);
  }
  return vector;
}
