export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
