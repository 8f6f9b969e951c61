/**
 * Field name normalization and collision-safe renaming
 */

export interface UniqueNameOptions {
  /** Maximum name length; suffixes are fitted inside it */
  readonly maxLength?: number;
  /** Treat names differing only by case as colliding (DBF) */
  readonly caseInsensitive?: boolean;
  /** Names the container keeps for itself; a column using one is suffixed */
  readonly reserved?: readonly string[];
}

/**
 * Normalize a column name to a lowercase ASCII identifier
 *
 * @example
 * normalizeIdentifier('Date De Création') // 'date_de_creation'
 * normalizeIdentifier('2019 Pop.')        // 'col_2019_pop'
 * normalizeIdentifier('%%%')              // 'col'
 */
export function normalizeIdentifier(raw: string): string {
  const ascii = raw.normalize('NFKD').replace(/[^\x00-\x7F]/g, '');
  const cleaned = ascii
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  if (cleaned === '') return 'col';
  return /^[0-9]/.test(cleaned) ? `col_${cleaned}` : cleaned;
}

/**
 * Truncate without leaving a trailing underscore
 */
export function truncateName(name: string, maxLength: number): string {
  if (name.length <= maxLength) return name;
  const cut = name.slice(0, maxLength).replace(/_+$/, '');
  return cut === '' ? name.slice(0, maxLength) : cut;
}

function withSuffix(base: string, n: number, maxLength: number | undefined): string {
  const suffix = String(n);
  if (maxLength === undefined) return `${base}${suffix}`;
  return `${base.slice(0, Math.max(0, maxLength - suffix.length))}${suffix}`;
}

/**
 * Make names unique
 *
 * Names are first truncated to `maxLength`. A name shared by several columns
 * is given numeric suffixes 1..n on every occurrence, in column order, skipping
 * any name already in use or reserved. Unique names are left as they are.
 *
 * @example
 * assignUniqueNames(['abcdefghijk', 'abcdefghijz'], { maxLength: 10 })
 * // ['abcdefghi1', 'abcdefghi2']
 */
export function assignUniqueNames(names: readonly string[], options: UniqueNameOptions = {}): string[] {
  const { maxLength, caseInsensitive = false, reserved = [] } = options;
  const key = (name: string): string => (caseInsensitive ? name.toLowerCase() : name);
  const reservedKeys = new Set(reserved.map(key));

  const bases = names.map((name) => (maxLength === undefined ? name : truncateName(name, maxLength)));

  const occurrences = new Map<string, number>();
  for (const base of bases) {
    occurrences.set(key(base), (occurrences.get(key(base)) ?? 0) + 1);
  }

  const isUnique = (base: string): boolean =>
    occurrences.get(key(base)) === 1 && !reservedKeys.has(key(base));

  const taken = new Set<string>(reservedKeys);
  for (const base of bases) {
    if (isUnique(base)) taken.add(key(base));
  }

  const counters = new Map<string, number>();
  return bases.map((base) => {
    if (isUnique(base)) return base;

    let n = counters.get(key(base)) ?? 1;
    let candidate = withSuffix(base, n, maxLength);
    while (taken.has(key(candidate))) {
      n++;
      candidate = withSuffix(base, n, maxLength);
    }
    counters.set(key(base), n + 1);
    taken.add(key(candidate));
    return candidate;
  });
}

/**
 * Fit names into a format that limits length and character set
 *
 * Names that already fit and are unique are kept verbatim.
 */
export function fitFieldNames(
  names: readonly string[],
  limits: UniqueNameOptions & { readonly asciiOnly?: boolean }
): string[] {
  const { asciiOnly = false, ...unique } = limits;
  const prepared = names.map((name) => (asciiOnly && /[^\x20-\x7E]/.test(name) ? normalizeIdentifier(name) : name));
  return assignUniqueNames(prepared, unique);
}
