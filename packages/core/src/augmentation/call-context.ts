/**
 * Classguard Core: Call Context
 *
 * The access context is the class whose code is running. A bound method or
 * initializer enters its declaring class for the duration of the call;
 * anything outside such a call runs in the external context.
 *
 * The stack follows synchronous extent only: code after an `await` inside
 * a method resumes in whatever context is active when it is scheduled.
 */

import type { AccessContext } from '../types/decision.js';
import { EXTERNAL_CONTEXT } from '../types/decision.js';

const active: string[] = [];

export function currentContext(): AccessContext {
  return active.at(-1) ?? EXTERNAL_CONTEXT;
}

/** Run `body` with `classId` as the access context. */
export function runInContext<T>(classId: string, body: () => T): T {
  active.push(classId);
  try {
    return body();
  } finally {
    active.pop();
  }
}
