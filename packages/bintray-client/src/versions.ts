import semver from "semver";

const RUN_PATTERN = /\d+|[A-Za-z]+/g;

function compareRuns(left: string, right: string): number {
  const leftNumeric = /^\d/.test(left);
  const rightNumeric = /^\d/.test(right);
  if (leftNumeric && rightNumeric) {
    const a = BigInt(left);
    const b = BigInt(right);
    return a === b ? 0 : a < b ? -1 : 1;
  }
  // A numeric run sorts after an alphabetic one: 1.0.1 > 1.0rc1.
  if (leftNumeric !== rightNumeric) return leftNumeric ? 1 : -1;
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Orders version strings. Valid semver strings compare by semver rules;
 * anything else is split into numeric and alphabetic runs.
 */
export function compareVersions(left: string, right: string): number {
  const a = semver.valid(left);
  const b = semver.valid(right);
  if (a !== null && b !== null) return semver.compare(a, b);

  const leftRuns = left.match(RUN_PATTERN) ?? [];
  const rightRuns = right.match(RUN_PATTERN) ?? [];
  const shared = Math.min(leftRuns.length, rightRuns.length);
  for (let i = 0; i < shared; i += 1) {
    const result = compareRuns(leftRuns[i], rightRuns[i]);
    if (result !== 0) return result;
  }
  return Math.sign(leftRuns.length - rightRuns.length);
}

export function sortVersions(versions: readonly string[]): string[] {
  return [...versions].sort(compareVersions);
}
