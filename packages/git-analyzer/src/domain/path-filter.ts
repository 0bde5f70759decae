export type PathFilter = {
  accepts: (path: string) => boolean;
};

/**
 * Builds a predicate rejecting every path the pattern matches anywhere.
 *
 * `g` and `y` flags are dropped: they make `RegExp.test` advance `lastIndex`
 * between calls, and the filter has to answer the same way for the same path.
 */
export const createPathFilter = (rejectedPathPattern: RegExp): PathFilter => {
  const pattern = new RegExp(
    rejectedPathPattern.source,
    rejectedPathPattern.flags.replace(/[gy]/g, ""),
  );

  return {
    accepts: (path) => !pattern.test(path),
  };
};
