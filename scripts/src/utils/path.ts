export function dedupe<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

/** Last segment of a path written with either separator style. */
export function displayName(filePath: string): string {
  const segments = filePath.split(/[\\/]/).filter((segment) => segment.length > 0);
  return segments.length > 0 ? segments[segments.length - 1] : filePath;
}
