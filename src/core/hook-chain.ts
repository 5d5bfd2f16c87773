/**
 * passgate Hook Chain
 * Ordered list of password checks whose verdicts are merged.
 */

import type { PasswordType, Verdict, Violation } from '../types/policy';

export interface PasswordCheckRequest {
    username: string | null;
    /** null when the credential is being cleared */
    password: string | null;
    passwordType: PasswordType;
}

export type PasswordCheck = (request: PasswordCheckRequest) => Verdict;

/**
 * Run each check in order and concatenate their verdicts.
 */
export function composeChecks(...checks: PasswordCheck[]): PasswordCheck {
    return (request) => {
        const merged: Violation[] = [];
        for (const check of checks) {
            merged.push(...check(request));
        }
        return merged;
    };
}

export class PasswordCheckChain {
    private readonly checks: PasswordCheck[];

    constructor(checks: PasswordCheck[] = []) {
        this.checks = [...checks];
    }

    /**
     * Append a check. Earlier checks run first.
     */
    use(check: PasswordCheck): this {
        this.checks.push(check);
        return this;
    }

    run(request: PasswordCheckRequest): Verdict {
        return composeChecks(...this.checks)(request);
    }

    get size(): number {
        return this.checks.length;
    }
}
