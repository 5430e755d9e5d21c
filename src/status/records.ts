export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Reads a key as display text. Numbers are accepted because upstream ids are not always
 * strings; blank strings count as absent.
 */
export const readText = (record: Record<string, unknown>, key: string): string | null => {
  const value = record[key]

  if (typeof value === "string") {
    return value.trim().length > 0 ? value : null
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value)
  }

  return null
}
