// Small general-purpose helpers

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}

// Copy of `url` with the given query parameters replaced by "***" (for logs and error messages)
export function maskParams(url: URL, names: readonly string[]): string {
  const masked = new URL(url.toString());
  for (const name of names) {
    if (masked.searchParams.has(name)) masked.searchParams.set(name, '***');
  }
  return masked.toString();
}
