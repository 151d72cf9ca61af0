/**
 * Split a dotted section number ("3.2.1") into its integer parts
 */
export function parseSectionNumber(value: string): number[] {
  return value
    .split('.')
    .filter((part) => part.length > 0)
    .map((part) => Number.parseInt(part, 10));
}

/**
 * Whether `next` may follow `previous` as the next numbered heading.
 *
 * Allowed moves are one level deeper starting at 1 (2 → 2.1), the next
 * sibling (2.1 → 2.2), or the next number at any shallower level
 * (2.1.3 → 2.2, 2.1.3 → 3). Skipped numbers are rejected. The first
 * numbered heading of a document must be 1.
 */
export function isValidSectionTransition(
  previous: string | null,
  next: string,
): boolean {
  const nextParts = parseSectionNumber(next);
  if (nextParts.length === 0 || nextParts.some((n) => !Number.isFinite(n))) {
    return false;
  }

  if (previous === null) {
    return nextParts.length === 1 && nextParts[0] === 1;
  }

  const previousParts = parseSectionNumber(previous);

  if (nextParts.length === previousParts.length + 1) {
    return (
      previousParts.every((part, i) => nextParts[i] === part) &&
      nextParts[nextParts.length - 1] === 1
    );
  }

  if (nextParts.length > previousParts.length) {
    return false;
  }

  const last = nextParts.length - 1;
  for (let i = 0; i < last; i++) {
    if (nextParts[i] !== previousParts[i]) {
      return false;
    }
  }
  return nextParts[last] === previousParts[last] + 1;
}
