/**
 * Destination repository name for a source repository: `{prefix}{owner}-{repo}`,
 * lower-cased, with the characters OneDev rejects in project names
 * collapsed to `-`. Deterministic, so a redelivered star resolves to the
 * same destination.
 */
export function resolveDestinationName(owner: string, repo: string, prefix = ""): string {
  const safeName = `${owner}-${repo}`
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");

  return `${prefix}${safeName}`;
}

export function appendTimestampSuffix(name: string, nowMs: number): string {
  return `${name}-${Math.floor(nowMs / 1000)}`;
}
