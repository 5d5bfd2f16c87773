/**
 * passgate Violation Messages
 * Detail lines for rejections and short forms for log-only warnings.
 */
import type { Violation } from '../types/policy';

/**
 * User-facing detail line for a rejected password.
 */
export function describeViolation(violation: Violation): string {
    switch (violation.kind) {
        case 'tooShort':
            return `Password must be at least ${violation.required} characters long.`;
        case 'missingUppercase':
            return 'Password must contain at least one uppercase letter.';
        case 'missingLowercase':
            return 'Password must contain at least one lowercase letter.';
        case 'missingDigit':
            return 'Password must contain at least one digit.';
        case 'missingSpecial':
            return 'Password must contain at least one special character.';
        case 'containsUsername':
            return 'Password must not contain the username.';
    }
}

/**
 * Short form used for log-only warnings.
 */
export function summarizeViolation(violation: Violation): string {
    switch (violation.kind) {
        case 'tooShort':
            return `password too short (len=${violation.actual}, min=${violation.required})`;
        case 'missingUppercase':
            return 'missing uppercase letter';
        case 'missingLowercase':
            return 'missing lowercase letter';
        case 'missingDigit':
            return 'missing digit';
        case 'missingSpecial':
            return 'missing special character';
        case 'containsUsername':
            return 'password contains username';
    }
}
