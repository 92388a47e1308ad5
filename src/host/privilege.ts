import { userInfo } from 'node:os';
import type { PrivilegeProbe, PrivilegeStatus } from '../core/context.js';

/** Effective uid 0, checked through the current process */
export const processPrivilege: PrivilegeProbe = {
  check(): PrivilegeStatus {
    const uid = typeof process.geteuid === 'function' ? process.geteuid() : -1;
    return { ok: uid === 0, user: currentUser(uid) };
  },
};

function currentUser(uid: number): string {
  try {
    return userInfo().username;
  } catch {
    return uid >= 0 ? `uid ${uid}` : 'unknown user';
  }
}
