/**
 * passgate - Password Complexity Guard
 * Checks new passwords against length, character-class and username rules
 * whenever a role's credential is created or changed.
 *
 * @example
 * ```typescript
 * import { createPasswordGuard, loadSettings } from 'passgate';
 *
 * const guard = createPasswordGuard({ settings: loadSettings() });
 *
 * // Throws PasswordPolicyError unless log_only is on
 * guard.check({ username: 'alice', password: 'S3cret!pass', passwordType: 'plaintext' });
 * ```
 */

// Core exports
export { PasswordPolicyError } from './core/PasswordPolicyError';
export { PolicyConfigError } from './core/PolicyConfigError';
export { createLogger, isLogLevel } from './core/logger';
export type { Logger, LogSink } from './core/logger';
export { enforceVerdict } from './core/enforcer';
export type { EnforceOptions, EnforceResult } from './core/enforcer';
export { composeChecks, PasswordCheckChain } from './core/hook-chain';
export type { PasswordCheck, PasswordCheckRequest } from './core/hook-chain';
export { evaluate, PolicyEvaluator, asciiLower } from './policy/PolicyEvaluator';
export { createPolicyConfig } from './policy/config';
export { describeViolation, summarizeViolation } from './policy/messages';
export {
    loadSettings,
    parseSettings,
    resolveConfig,
    getDefaultSettings,
    hasConfigFile,
    CONFIG_FILE,
    SETTING_PREFIX,
} from './bootstrap';
export type { PassgateSettings } from './bootstrap';
export { DEFAULT_POLICY, MAX_MIN_LENGTH } from './types/policy';
export type {
    PolicyConfig,
    Violation,
    ViolationKind,
    Verdict,
    PasswordType,
    LogLevel,
    ReportMode,
} from './types/policy';

// Import for internal use
import type { LogLevel, PolicyConfig, ReportMode } from './types/policy';
import { evaluate } from './policy/PolicyEvaluator';
import { createLogger } from './core/logger';
import type { LogSink } from './core/logger';
import { enforceVerdict } from './core/enforcer';
import type { EnforceResult } from './core/enforcer';
import { PasswordCheckChain } from './core/hook-chain';
import type { PasswordCheck, PasswordCheckRequest } from './core/hook-chain';
import { getDefaultSettings, resolveConfig } from './bootstrap';
import type { PassgateSettings } from './bootstrap';

export interface PasswordGuardOptions {
    /** Resolved settings (default: built-in defaults) */
    settings?: PassgateSettings;
    /** Checks registered before passgate; they run first */
    previous?: PasswordCheck[];
    /** Overrides settings.logLevel */
    logLevel?: LogLevel;
    /** Overrides settings.report */
    report?: ReportMode;
    /** Where log lines go (default: console) */
    sink?: LogSink;
}

export interface PasswordGuard {
    /**
     * Check a credential change. Throws PasswordPolicyError on rejection.
     */
    check(request: PasswordCheckRequest): EnforceResult;
    /**
     * Effective policy for a role.
     */
    configFor(username: string | null): PolicyConfig;
    getSettings(): Readonly<PassgateSettings>;
}

/**
 * Create a guard for the host's credential-change pathway.
 */
export function createPasswordGuard(options: PasswordGuardOptions = {}): PasswordGuard {
    const settings = options.settings ?? getDefaultSettings();
    const logger = createLogger(options.logLevel ?? settings.logLevel, options.sink);
    const report = options.report ?? settings.report;

    const passgateCheck: PasswordCheck = ({ username, password, passwordType }) => {
        // Only plaintext can be inspected; stored hashes are never re-checked
        if (passwordType !== 'plaintext') {
            logger.debug(`skipping non-plaintext password (${passwordType})`);
            return [];
        }
        return evaluate(username, password, resolveConfig(settings, username));
    };

    const chain = new PasswordCheckChain(options.previous ?? []).use(passgateCheck);

    return {
        check(request: PasswordCheckRequest): EnforceResult {
            const verdict = chain.run(request);
            return enforceVerdict(verdict, resolveConfig(settings, request.username), {
                report,
                logger,
            });
        },
        configFor(username: string | null): PolicyConfig {
            return resolveConfig(settings, username);
        },
        getSettings(): Readonly<PassgateSettings> {
            return settings;
        },
    };
}

export default createPasswordGuard;
