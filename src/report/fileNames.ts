export function toFileSafeName(value: string): string {
  const safe = value.trim().replace(/[^A-Za-z0-9.-]+/g, "_").replace(/^_+|_+$/g, "");
  return safe || "group";
}

/** Names with equal keys would land on the same file on a case-insensitive file system. */
export function fileNameKey(value: string): string {
  return toFileSafeName(value).toLowerCase();
}
