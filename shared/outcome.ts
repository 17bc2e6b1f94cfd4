export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(reason: string): Outcome<T> {
  return { ok: false, reason };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a collaborator call and folds a throw or rejection into a failure
 * outcome, so callers only ever branch on `ok`.
 */
export async function attempt<T>(call: () => Promise<Outcome<T>> | Outcome<T>): Promise<Outcome<T>> {
  try {
    return await call();
  } catch (error) {
    return fail(describeError(error));
  }
}
