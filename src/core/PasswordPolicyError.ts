/**
 * passgate Password Policy Error
 * Raised when an enforcing check rejects a password.
 */
import type { Violation } from '../types/policy';
import { describeViolation } from '../policy/messages';

export class PasswordPolicyError extends Error {
    public readonly code: string = 'ERR_PASSWORD_POLICY';
    /** SQLSTATE the host reports: invalid_parameter_value */
    public readonly sqlState: string = '22023';
    public readonly detail: string;
    public readonly violations: readonly Violation[];

    constructor(violations: readonly Violation[]) {
        super('[passgate] password does not meet complexity requirements');
        this.name = 'PasswordPolicyError';
        this.violations = violations;
        this.detail = violations.map(describeViolation).join(' ');
        // Maintain proper stack trace in V8 engines
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PasswordPolicyError);
        }
    }
}
