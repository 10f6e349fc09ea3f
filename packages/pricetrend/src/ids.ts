export function uniqueIds(ids: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const raw of ids) {
    const id = String(raw ?? "").trim().toLowerCase();
    if (id) seen.add(id);
  }
  return [...seen];
}

export function splitList(raw: string): string[] {
  return uniqueIds(raw.split(","));
}
