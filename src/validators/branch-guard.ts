import { PROTECTED_REF } from '../constants.js';
import { PolicyViolationError } from '../errors.js';

/** A branch or ref argument a destructive tool writes to. */
export interface GuardedTarget {
  argument: string;
  ref: string;
}

/**
 * Refuses destructive tool calls aimed at the production branch.
 *
 * Pure string comparison against the declared argument; lakehouse state is
 * never consulted, so the check has no side effects.
 */
export class ProtectedBranchGuard {
  constructor(readonly protectedRef: string = PROTECTED_REF) {}

  isProtected(ref: string | undefined): boolean {
    return ref === this.protectedRef;
  }

  check(tool: string, targets: readonly GuardedTarget[]): void {
    for (const target of targets) {
      if (this.isProtected(target.ref)) {
        throw new PolicyViolationError(tool, target.argument, target.ref);
      }
    }
  }
}
