/**
 * Default exclude patterns, matched against paths relative to the template root
 */
export const DEFAULT_EXCLUDE_PATTERNS = [
  'README.md',
  '**/README.md',
  'node_modules/**',
  '**/node_modules/**',
  '.*/**',
  '**/.*/**',
];

/**
 * Check if a relative path should be excluded based on patterns.
 * Directories are checked with a trailing slash (`drafts/`).
 */
export function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  for (const pattern of patterns) {
    if (matchGlob(relativePath, pattern)) {
      return true;
    }
  }
  return false;
}

/**
 * Simple glob pattern matching
 * Supports: *, **, ?
 */
export function matchGlob(str: string, pattern: string): boolean {
  // Normalize path separators
  const normalizedStr = str.replace(/\\/g, '/');
  const normalizedPattern = pattern.replace(/\\/g, '/');

  const regexPattern = normalizedPattern
    .replace(/[.+^${}()|[\]]/g, '\\$&') // Escape regex special chars
    .replace(/\*\*/g, '\x00') // Temporarily replace ** with null char
    .replace(/\*/g, '[^/]*') // * matches anything except /
    .replace(/\?/g, '[^/]') // ? matches single char except /
    .replace(/\x00/g, '.*'); // ** matches anything including /

  const regex = new RegExp(`^${regexPattern}$`);
  return regex.test(normalizedStr);
}
