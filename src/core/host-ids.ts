/** Numeric user and group of the invoking user, as strings. */
export interface HostIds {
  uid: string;
  gid: string;
}

/**
 * The current process's uid/gid. Empty strings on platforms without
 * POSIX ids, which callers treat as "unknown".
 */
export function currentHostIds(): HostIds {
  return {
    uid: process.getuid !== undefined ? String(process.getuid()) : '',
    gid: process.getgid !== undefined ? String(process.getgid()) : '',
  };
}
