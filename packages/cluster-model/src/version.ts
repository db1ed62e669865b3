const parse = (version: string): number[] | null => {
  const match = /^(\d+)\.(\d+)\.(\d+)(?:[-+].*)?$/.exec(version.trim());
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3])];
};

/** Returns a negative number, zero or a positive number; null when either side is not `x.y.z`. */
export const compareVersions = (left: string, right: string): number | null => {
  const a = parse(left);
  const b = parse(right);
  if (!a || !b) {
    return null;
  }
  for (let index = 0; index < 3; index += 1) {
    const diff = a[index] - b[index];
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
};

export const isMajorCompatible = (version: string | undefined, current: string): boolean => {
  if (!version) {
    return false;
  }
  const parsed = parse(version);
  const reference = parse(current);
  if (!parsed || !reference) {
    return false;
  }
  return parsed[0] === reference[0];
};

export const isExactVersion = (version: string | undefined, current: string): boolean =>
  version !== undefined && compareVersions(version, current) === 0;
