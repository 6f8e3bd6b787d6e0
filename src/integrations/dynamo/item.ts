// Readers for untyped document-client items

export type Item = Record<string, unknown>;

export function readString(item: Item, key: string): string | undefined {
  const v = item[key];
  return typeof v === "string" ? v : undefined;
}

export function readNumber(item: Item, key: string): number | undefined {
  const v = item[key];
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Number(v);
  return undefined;
}

export function readBoolean(item: Item, key: string): boolean {
  return item[key] === true;
}

export function readStringList(item: Item, key: string): string[] {
  const v = item[key];
  if (Array.isArray(v)) return v.filter((x): x is string => typeof x === "string");
  if (v instanceof Set) return Array.from(v).filter((x): x is string => typeof x === "string");
  return [];
}
