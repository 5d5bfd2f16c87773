/**
 * passgate Policy Type Definitions
 * Password complexity rules for credential changes.
 */

/**
 * Snapshot of the password policy tunables.
 * Built once per evaluation (or cached by the caller) and never mutated.
 */
export interface PolicyConfig {
    /** Minimum accepted password length */
    readonly minLength: number;
    /** Require at least one ASCII uppercase letter */
    readonly requireUpper: boolean;
    /** Require at least one ASCII lowercase letter */
    readonly requireLower: boolean;
    /** Require at least one ASCII digit */
    readonly requireDigit: boolean;
    /** Require at least one character outside A-Z, a-z, 0-9 */
    readonly requireSpecial: boolean;
    /** Reject passwords containing the username (case-insensitive) */
    readonly rejectUsername: boolean;
    /** Downgrade violations to warnings instead of rejecting */
    readonly logOnly: boolean;
}

/**
 * A single broken rule.
 */
export type Violation =
    | { readonly kind: 'tooShort'; readonly actual: number; readonly required: number }
    | { readonly kind: 'missingUppercase' }
    | { readonly kind: 'missingLowercase' }
    | { readonly kind: 'missingDigit' }
    | { readonly kind: 'missingSpecial' }
    | { readonly kind: 'containsUsername' };

export type ViolationKind = Violation['kind'];

/**
 * Every violation found for one evaluation, in rule order.
 * Empty means the password was accepted.
 */
export type Verdict = readonly Violation[];

/**
 * Form a credential arrives in. Only plaintext can be inspected.
 */
export type PasswordType = 'plaintext' | 'md5' | 'scram-sha-256';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * How much of a verdict a rejection reports.
 * 'first' mirrors the host's single-error behavior.
 */
export const REPORT_MODES = ['first', 'all'] as const;

export type ReportMode = (typeof REPORT_MODES)[number];

/** Largest value the host accepts for an integer setting */
export const MAX_MIN_LENGTH = 2147483647;

/**
 * Default policy configuration.
 */
export const DEFAULT_POLICY: PolicyConfig = Object.freeze({
    minLength: 12,
    requireUpper: true,
    requireLower: true,
    requireDigit: true,
    requireSpecial: true,
    rejectUsername: true,
    logOnly: false,
});
