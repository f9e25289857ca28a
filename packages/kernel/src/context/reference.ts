/**
 * Trigger references: `"action:package"` or a bare `"action"`.
 *
 * The string is split once, from the right, on the separator. Everything
 * left of the last separator is the action name, so `"a:b:c"` addresses
 * action `a:b` of package `c`. Empty parts are kept as-is and simply fail
 * to resolve.
 */

export const REFERENCE_SEPARATOR = ':';

export interface ActionReference {
  readonly actionName: string;
  /** Absent for a bare reference: resolve against the active package. */
  readonly packageName?: string | undefined;
}

export function parseActionReference(reference: string): ActionReference {
  const at = reference.lastIndexOf(REFERENCE_SEPARATOR);
  if (at === -1) {
    return { actionName: reference };
  }
  return {
    actionName: reference.slice(0, at),
    packageName: reference.slice(at + REFERENCE_SEPARATOR.length),
  };
}

export function formatActionReference(actionName: string, packageName: string): string {
  return `${actionName}${REFERENCE_SEPARATOR}${packageName}`;
}
