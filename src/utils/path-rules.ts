/**
 * path-rules.ts
 * Exact-path and prefix matching shared by the rate limiter and response cache
 */

export interface PathRules {
  includePaths?: string[];
  includePrefixes?: string[];
  excludePaths: string[];
  excludePrefixes: string[];
}

export function isExcludedPath(
  path: string,
  rules: Pick<PathRules, 'excludePaths' | 'excludePrefixes'>
): boolean {
  return (
    rules.excludePaths.includes(path) || rules.excludePrefixes.some(prefix => path.startsWith(prefix))
  );
}

/**
 * Exclusions win; otherwise the path must match an include path or prefix
 */
export function isIncludedPath(path: string, rules: PathRules): boolean {
  if (isExcludedPath(path, rules)) {
    return false;
  }
  return (
    (rules.includePaths ?? []).includes(path) ||
    (rules.includePrefixes ?? []).some(prefix => path.startsWith(prefix))
  );
}
