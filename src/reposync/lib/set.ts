export const toggleSetValue = <T>(source: ReadonlySet<T>, value: T): Set<T> => {
  const next = new Set(source);
  if (next.has(value)) {
    next.delete(value);
  } else {
    next.add(value);
  }
  return next;
};

export const setWithValues = <T>(source: ReadonlySet<T>, values: Iterable<T>): Set<T> => {
  const next = new Set(source);
  for (const value of values) {
    next.add(value);
  }
  return next;
};
