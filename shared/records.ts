export type UnknownRecord = Readonly<Record<string, unknown>>;

export function isRecord(value: unknown): value is UnknownRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Reads a key written either in snake_case or camelCase. */
export function readKey(record: UnknownRecord, snake: string, camel?: string): unknown {
  return record[snake] ?? (camel === undefined ? undefined : record[camel]);
}
