/**
 * Version Utilities
 *
 * Parsing and comparing the versions tools print.
 */

interface ParsedVersion {
  major: number;
  minor: number;
  patch: number;
}

/**
 * Parse the first version number in a string
 * @param text - e.g. "NVIM v0.11.0" or "ripgrep 14.1.0"
 */
export function parseVersion(text: string): ParsedVersion | null {
  if (!text) return null;

  const match = text.match(/(\d+)\.(\d+)(?:\.(\d+))?/);
  if (!match) return null;

  return {
    major: parseInt(match[1] ?? '0', 10),
    minor: parseInt(match[2] ?? '0', 10),
    patch: parseInt(match[3] ?? '0', 10),
  };
}

/**
 * Compare two versions
 * @returns Negative if a < b, 0 if equal, positive if a > b. Unparseable versions compare as null.
 */
export function compareVersions(a: string, b: string): number | null {
  const vA = parseVersion(a);
  const vB = parseVersion(b);

  if (!vA || !vB) return null;

  if (vA.major !== vB.major) return vA.major - vB.major;
  if (vA.minor !== vB.minor) return vA.minor - vB.minor;
  return vA.patch - vB.patch;
}

/**
 * Check that `actual` is at least `minimum`
 */
export function satisfiesMinimum(actual: string, minimum: string): boolean {
  const diff = compareVersions(actual, minimum);
  return diff !== null && diff >= 0;
}
