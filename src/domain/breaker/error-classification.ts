/** Any error class; subclasses match as well. */
export type ErrorClass = abstract new (...args: never[]) => Error;

/** Classifies errors that are not expressible as a class (e.g. HTTP 4xx responses). */
export interface ErrorMatcher {
  matches(error: unknown): boolean;
}

export type ExcludedError = ErrorClass | ErrorMatcher;

/** True when `error` belongs to one of the excluded classifications. */
export function isExcludedError(error: unknown, excluded: readonly ExcludedError[]): boolean {
  return excluded.some((classification) =>
    typeof classification === 'function' ? error instanceof classification : classification.matches(error),
  );
}
