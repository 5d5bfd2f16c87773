/**
 * passgate Policy Config
 * Builds validated, frozen PolicyConfig snapshots.
 */

import { DEFAULT_POLICY, MAX_MIN_LENGTH } from '../types/policy';
import type { PolicyConfig } from '../types/policy';
import { PolicyConfigError } from '../core/PolicyConfigError';

/**
 * Merge overrides onto the defaults and freeze the result.
 * Throws PolicyConfigError if minLength is out of range.
 */
export function createPolicyConfig(
    overrides: Partial<PolicyConfig> = {},
    base: PolicyConfig = DEFAULT_POLICY
): PolicyConfig {
    const config: PolicyConfig = { ...base, ...overrides };

    if (
        !Number.isInteger(config.minLength) ||
        config.minLength < 0 ||
        config.minLength > MAX_MIN_LENGTH
    ) {
        throw new PolicyConfigError(
            'min_length',
            `expected an integer between 0 and ${MAX_MIN_LENGTH}, got ${config.minLength}`
        );
    }

    return Object.freeze(config);
}
