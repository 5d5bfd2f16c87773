/**
 * passgate Enforcer
 * Turns a verdict into an outcome: accept, warn, or reject.
 */

import type { PolicyConfig, ReportMode, Verdict } from '../types/policy';
import { summarizeViolation } from '../policy/messages';
import { PasswordPolicyError } from './PasswordPolicyError';
import { createLogger } from './logger';
import type { Logger } from './logger';

export interface EnforceOptions {
    /** Violations carried by a rejection (default: 'first') */
    report?: ReportMode;
    logger?: Logger;
}

export interface EnforceResult {
    accepted: true;
    /** Violations that were downgraded to warnings */
    violations: Verdict;
}

/**
 * Apply the enforcement mode to a verdict.
 * In log-only mode every violation is logged and the password is accepted.
 * Otherwise any violation throws PasswordPolicyError.
 */
export function enforceVerdict(
    verdict: Verdict,
    config: PolicyConfig,
    options: EnforceOptions = {}
): EnforceResult {
    if (verdict.length === 0) {
        return { accepted: true, violations: [] };
    }

    if (config.logOnly) {
        const logger = options.logger ?? createLogger();
        for (const violation of verdict) {
            logger.warn(summarizeViolation(violation));
        }
        return { accepted: true, violations: verdict };
    }

    const reported = options.report === 'all' ? verdict : verdict.slice(0, 1);
    throw new PasswordPolicyError(reported);
}
