/**
 * ALLOWED_SOURCES entries are regular expressions matched against the
 * whole hostname.
 */
export function compileHostPattern(pattern: string): RegExp {
  return new RegExp(`^${pattern}$`);
}

export function isValidHostPattern(pattern: string): boolean {
  try {
    compileHostPattern(pattern);
    return true;
  } catch {
    return false;
  }
}
