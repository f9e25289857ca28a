/**
 * Human-readable descriptions of node-effecting primitives.
 *
 * The real context logs these before delegating to the node; the mock
 * context logs the same text as the effect it did not perform, so a dry run
 * reads exactly like the run it previews.
 */

export const describeEffect = {
  sudo: (command: string): string => `sudo ${command}`,
  upload: (from: string, to: string): string => `UPLOAD: ${from} => ${to}`,
  download: (from: string, to: string): string => `DOWNLOAD: ${to} <= ${from}`,
  mkdir: (path: string): string => `MKDIR: ${path}`,
  remove: (path: string): string => `REMOVE: ${path}`,
  copy: (from: string, to: string): string => `COPY: ${from} => ${to}`,
  move: (from: string, to: string): string => `MOVE: ${from} => ${to}`,
  setPermissions: (path: string, mask: number): string =>
    `SET_PERMISSIONS: ${path} ${formatMode(mask)}`,
  setOwner: (path: string, user: string | undefined, group: string | undefined): string =>
    `SET_OWNER: ${path} ${ownerSpec(user, group)}`,
} as const;

/** Octal rendering of permission bits, e.g. 420 → "644". */
export function formatMode(mask: number): string {
  return mask.toString(8);
}

/** `user:group`, `user` or `:group`, the way chown takes it. */
export function ownerSpec(user: string | undefined, group: string | undefined): string {
  if (group === undefined) return user ?? '';
  return `${user ?? ''}:${group}`;
}
