/**
 * Task name derivation.
 *
 * The same disambiguation runs for submissions without an explicit name and
 * for retries: `base`, then `base-2`, `base-3`, ... until a free one is found.
 */

export const FALLBACK_TASK_NAME = "worker";

export function uniqueName(base: string, isTaken: (name: string) => boolean): string {
  if (!isTaken(base)) {
    return base;
  }
  let suffix = 2;
  while (isTaken(`${base}-${suffix}`)) {
    suffix++;
  }
  return `${base}-${suffix}`;
}

/**
 * Base name for a task submitted without one: the callable's own name.
 * Anonymous functions and `bound` wrappers fall back to "worker".
 */
export function deriveName(callable: { readonly name: string }): string {
  const name = callable.name.replace(/^bound /, "").trim();
  return name.length > 0 ? name : FALLBACK_TASK_NAME;
}
