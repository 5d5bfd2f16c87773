/**
 * passgate Policy Evaluator
 * Classifies a candidate password against a PolicyConfig.
 * Pure: no I/O, no shared state, never throws.
 */

import type { PolicyConfig, Verdict, Violation } from '../types/policy';
import { DEFAULT_POLICY } from '../types/policy';

// ASCII code points
const UPPER_A = 65;
const UPPER_Z = 90;
const LOWER_A = 97;
const LOWER_Z = 122;
const DIGIT_0 = 48;
const DIGIT_9 = 57;

interface CharacterClasses {
    upper: boolean;
    lower: boolean;
    digit: boolean;
    special: boolean;
}

/**
 * Single pass over the UTF-8 bytes. Anything outside A-Z, a-z, 0-9 is special,
 * including whitespace and every byte of a non-ASCII character.
 */
function scanCharacterClasses(bytes: Buffer): CharacterClasses {
    const seen: CharacterClasses = { upper: false, lower: false, digit: false, special: false };

    for (const code of bytes) {

        if (code >= UPPER_A && code <= UPPER_Z) {
            seen.upper = true;
        } else if (code >= LOWER_A && code <= LOWER_Z) {
            seen.lower = true;
        } else if (code >= DIGIT_0 && code <= DIGIT_9) {
            seen.digit = true;
        } else {
            seen.special = true;
        }
    }

    return seen;
}

/**
 * Lowercase A-Z only; every other character is left alone.
 */
export function asciiLower(value: string): string {
    return value.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));
}

/**
 * Evaluate a password. Returns every violation found, in rule order:
 * length, uppercase, lowercase, digit, special, username.
 *
 * A null password (credential cleared) has nothing to check.
 * A null or empty username skips the username rule.
 */
export function evaluate(
    username: string | null,
    password: string | null,
    config: PolicyConfig
): Verdict {
    if (password === null) {
        return [];
    }

    const violations: Violation[] = [];
    // Length and classes are measured in UTF-8 bytes, as the host stores them
    const bytes = Buffer.from(password, 'utf8');

    // Length never short-circuits the remaining rules
    if (bytes.length < config.minLength) {
        violations.push({
            kind: 'tooShort',
            actual: bytes.length,
            required: config.minLength,
        });
    }

    const seen = scanCharacterClasses(bytes);

    if (config.requireUpper && !seen.upper) {
        violations.push({ kind: 'missingUppercase' });
    }
    if (config.requireLower && !seen.lower) {
        violations.push({ kind: 'missingLowercase' });
    }
    if (config.requireDigit && !seen.digit) {
        violations.push({ kind: 'missingDigit' });
    }
    if (config.requireSpecial && !seen.special) {
        violations.push({ kind: 'missingSpecial' });
    }

    if (
        config.rejectUsername &&
        username !== null &&
        username.length > 0 &&
        asciiLower(password).includes(asciiLower(username))
    ) {
        violations.push({ kind: 'containsUsername' });
    }

    return violations;
}

/**
 * Binds one config snapshot for repeated evaluation.
 */
export class PolicyEvaluator {
    private readonly config: PolicyConfig;

    constructor(config: PolicyConfig = DEFAULT_POLICY) {
        this.config = config;
    }

    evaluate(username: string | null, password: string | null): Verdict {
        return evaluate(username, password, this.config);
    }

    /**
     * Get the bound configuration.
     */
    getConfig(): PolicyConfig {
        return this.config;
    }
}
