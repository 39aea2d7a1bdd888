/**
 * Presents single-valued names as scalars and everything else as lists:
 * `{x: ['2'], y: ['1', '2']}` becomes `{x: '2', y: ['1', '2']}`.
 */
export const collapseValues = <T>(groups: Iterable<readonly [string, readonly T[]]>): Record<string, T | T[]> => {
  const collapsed = new Map<string, T | T[]>();
  for (const [name, values] of groups) {
    collapsed.set(name, values.length === 1 ? values[0] : [...values]);
  }

  return Object.fromEntries(collapsed);
};

export const groupValues = <T>(entries: Iterable<readonly [string, T]>): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const [name, value] of entries) {
    const existing = groups.get(name);
    if (existing) {
      existing.push(value);
    } else {
      groups.set(name, [value]);
    }
  }

  return groups;
};
