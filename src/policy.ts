import type { MutationClass, OperationDescriptor } from './operations.js';
import { ReadonlyViolationError } from './utils/errors.js';

export type PolicyMode = 'normal' | 'readonly';

export type Authorization = { allowed: true } | { allowed: false; error: ReadonlyViolationError };

export function policyModeFromFlag(readonly: boolean): PolicyMode {
  return readonly ? 'readonly' : 'normal';
}

export function permits(mode: PolicyMode, mutation: MutationClass): boolean {
  return mode === 'normal' || mutation === 'read';
}

/**
 * Decides from the operation's declared mutation class alone; the resource
 * kind and target context play no part.
 */
export class PolicyGate {
  constructor(readonly mode: PolicyMode) {
    Object.freeze(this);
  }

  authorize(operation: Pick<OperationDescriptor<unknown>, 'name' | 'mutation'>): Authorization {
    if (permits(this.mode, operation.mutation)) {
      return { allowed: true };
    }
    return { allowed: false, error: new ReadonlyViolationError(operation.name) };
  }
}
