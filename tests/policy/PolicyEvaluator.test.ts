import { describe, it, expect } from 'vitest';
import { evaluate, PolicyEvaluator, asciiLower } from '../../src/policy/PolicyEvaluator';
import { createPolicyConfig } from '../../src/policy/config';
import { DEFAULT_POLICY } from '../../src/types/policy';
import type { PolicyConfig, ViolationKind } from '../../src/types/policy';

const cfg = createPolicyConfig({ minLength: 8 });

const kinds = (username: string | null, password: string | null, config: PolicyConfig = cfg): ViolationKind[] =>
    evaluate(username, password, config).map((v) => v.kind);

describe('PolicyEvaluator', () => {
    describe('Reference Scenarios', () => {
        it('should report only length for a short but complete password', () => {
            expect(evaluate('sp_short', 'Aa1!', cfg)).toEqual([
                { kind: 'tooShort', actual: 4, required: 8 },
            ]);
        });

        it('should flag a missing uppercase letter', () => {
            expect(kinds('sp_noupper', 'abc12345!')).toEqual(['missingUppercase']);
        });

        it('should flag a missing lowercase letter', () => {
            expect(kinds('sp_nolower', 'ABC12345!')).toEqual(['missingLowercase']);
        });

        it('should flag a missing digit', () => {
            expect(kinds('sp_nodigit', 'Abcdefg!')).toEqual(['missingDigit']);
        });

        it('should flag a missing special character', () => {
            expect(kinds('sp_nospecial', 'Abcdefg1')).toEqual(['missingSpecial']);
        });

        it('should flag a password containing the username', () => {
            expect(kinds('spuser', 'Spuser1!')).toEqual(['containsUsername']);
        });

        it('should accept a password satisfying every rule', () => {
            expect(evaluate('sp_ok', 'Abc12345!', cfg)).toEqual([]);
        });
    });

    describe('Absent Password', () => {
        it('should return an empty verdict for a cleared password', () => {
            expect(evaluate('alice', null, cfg)).toEqual([]);
            expect(evaluate(null, null, DEFAULT_POLICY)).toEqual([]);
        });
    });

    describe('Length Rule', () => {
        it('should not short-circuit the remaining rules', () => {
            expect(evaluate('bob', 'abc', cfg)).toEqual([
                { kind: 'tooShort', actual: 3, required: 8 },
                { kind: 'missingUppercase' },
                { kind: 'missingDigit' },
                { kind: 'missingSpecial' },
            ]);
        });

        it('should accept a password exactly at the minimum', () => {
            expect(kinds('bob', 'Abcde12!')).toEqual([]);
        });

        it('should report the empty password with every class missing', () => {
            expect(kinds('bob', '')).toEqual([
                'tooShort',
                'missingUppercase',
                'missingLowercase',
                'missingDigit',
                'missingSpecial',
            ]);
        });

        it('should never report length when the minimum is zero', () => {
            const config = createPolicyConfig({ minLength: 0 });
            expect(kinds('bob', '', config)).not.toContain('tooShort');
        });

        it('should measure length in UTF-8 bytes', () => {
            expect(evaluate('bob', 'Pässwörd1!', createPolicyConfig({ minLength: 12 }))).toEqual([]);
            expect(evaluate('bob', 'Pässwörd1!', createPolicyConfig({ minLength: 13 }))).toEqual([
                { kind: 'tooShort', actual: 12, required: 13 },
            ]);
        });

        it('should use the default minimum of 12', () => {
            expect(evaluate('bob', 'Abc12345!', DEFAULT_POLICY)).toEqual([
                { kind: 'tooShort', actual: 9, required: 12 },
            ]);
        });
    });

    describe('Character Classes', () => {
        it('should count whitespace as special', () => {
            expect(kinds('bob', 'Abc 12345')).toEqual([]);
        });

        it('should count non-ASCII characters as special, not as letters', () => {
            expect(kinds('bob', 'ÄÖÜäöü12')).toEqual(['missingUppercase', 'missingLowercase']);
        });

        it('should drop exactly the disabled class', () => {
            const lenient = createPolicyConfig({ minLength: 8, requireSpecial: false });
            expect(kinds('bob', 'abcdefgh')).toEqual(['missingUppercase', 'missingDigit', 'missingSpecial']);
            expect(kinds('bob', 'abcdefgh', lenient)).toEqual(['missingUppercase', 'missingDigit']);
        });

        const classFlags: Array<[ViolationKind, Partial<PolicyConfig>]> = [
            ['missingUppercase', { requireUpper: false }],
            ['missingLowercase', { requireLower: false }],
            ['missingDigit', { requireDigit: false }],
            ['missingSpecial', { requireSpecial: false }],
        ];

        it.each(classFlags)('should drop only %s when its flag is off', (kind, overrides) => {
            const strict = createPolicyConfig({ minLength: 0 });
            const relaxed = createPolicyConfig({ minLength: 0, ...overrides });
            const everyClass: ViolationKind[] = [
                'missingUppercase',
                'missingLowercase',
                'missingDigit',
                'missingSpecial',
            ];

            expect(kinds('bob', '', strict)).toEqual(everyClass);
            expect(kinds('bob', '', relaxed)).toEqual(everyClass.filter((k) => k !== kind));
        });

        it('should report nothing for classes when every flag is off', () => {
            const config = createPolicyConfig({
                minLength: 0,
                requireUpper: false,
                requireLower: false,
                requireDigit: false,
                requireSpecial: false,
            });
            expect(kinds('bob', '!!!!', config)).toEqual([]);
        });
    });

    describe('Username Rule', () => {
        it('should match the username case-insensitively', () => {
            for (const password of ['myALicepass1!', 'my_alice_1A!', 'xxALICE9a!', 'AlIcE#123z']) {
                expect(kinds('Alice', password)).toContain('containsUsername');
            }
        });

        it('should skip the rule for a null or empty username', () => {
            expect(kinds(null, 'Abc12345!')).toEqual([]);
            expect(kinds('', 'Abc12345!')).toEqual([]);
        });

        it('should skip the rule when rejectUsername is off', () => {
            const config = createPolicyConfig({ minLength: 8, rejectUsername: false });
            expect(kinds('spuser', 'Spuser1!', config)).toEqual([]);
        });

        it('should fold only ASCII letters', () => {
            expect(kinds('émile', 'ÉMILE12aA!')).toEqual([]);
            expect(kinds('émile', 'éMILE12aA!')).toEqual(['containsUsername']);
        });
    });

    describe('Determinism', () => {
        it('should return equal verdicts for repeated calls', () => {
            const first = evaluate('carol', 'carol', cfg);
            const second = evaluate('carol', 'carol', cfg);
            expect(second).toEqual(first);
        });
    });

    describe('Bound Evaluator', () => {
        it('should evaluate against its own config', () => {
            const evaluator = new PolicyEvaluator(cfg);
            expect(evaluator.getConfig()).toBe(cfg);
            expect(evaluator.evaluate('sp_short', 'Aa1!')).toEqual([
                { kind: 'tooShort', actual: 4, required: 8 },
            ]);
        });

        it('should default to the default policy', () => {
            expect(new PolicyEvaluator().getConfig()).toBe(DEFAULT_POLICY);
        });
    });

    describe('ASCII Folding', () => {
        it('should lowercase A-Z and leave everything else', () => {
            expect(asciiLower('AbC-ÄÖ_9')).toBe('abc-ÄÖ_9');
        });
    });
});
