/**
 * passgate Configuration Bootstrap
 * Synchronously reads passgate.json at startup and resolves the
 * per-role policy snapshots the guard evaluates against.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { LogLevel, PolicyConfig, ReportMode } from './types/policy';
import { DEFAULT_POLICY, LOG_LEVELS, MAX_MIN_LENGTH, REPORT_MODES } from './types/policy';
import { createPolicyConfig } from './policy/config';
import { PolicyConfigError } from './core/PolicyConfigError';

export const CONFIG_FILE = 'passgate.json';

/** Reserved setting prefix */
export const SETTING_PREFIX = 'passgate.';

/** Operator-facing option names */
const SETTING_NAMES = [
    'min_length',
    'require_upper',
    'require_lower',
    'require_digit',
    'require_special',
    'reject_username',
    'log_only',
] as const;

type SettingName = (typeof SETTING_NAMES)[number];

/** Resolved settings: a global policy plus per-role overrides */
export interface PassgateSettings {
    policy: PolicyConfig;
    roles: ReadonlyMap<string, Partial<PolicyConfig>>;
    logLevel: LogLevel;
    report: ReportMode;
}

const DEFAULT_SETTINGS: PassgateSettings = Object.freeze({
    policy: DEFAULT_POLICY,
    roles: new Map<string, Partial<PolicyConfig>>(),
    logLevel: 'warn',
    report: 'first',
});

const TRUE_WORDS = ['true', 'on', 'yes', '1'] as const;
const FALSE_WORDS = ['false', 'off', 'no', '0'] as const;
const TRUE_SET: ReadonlySet<string> = new Set(TRUE_WORDS);

function isSettingName(name: string): name is SettingName {
    return SETTING_NAMES.some((known) => known === name);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Schemas
// ============================================================================

/** Booleans in any of the spellings the host accepts */
const booleanSetting = z.union(
    [
        z.boolean(),
        z.union([z.literal(0), z.literal(1)]).transform((value) => value === 1),
        z
            .string()
            .trim()
            .toLowerCase()
            .pipe(z.enum([...TRUE_WORDS, ...FALSE_WORDS]))
            .transform((word) => TRUE_SET.has(word)),
    ],
    { errorMap: (_issue, ctx) => ({ message: `expected a boolean, got ${JSON.stringify(ctx.data)}` }) }
);

const lengthSetting = z
    .union(
        [
            z.number(),
            z
                .string()
                .regex(/^\s*-?\d+\s*$/, { message: 'expected an integer' })
                .transform((value) => Number.parseInt(value, 10)),
        ],
        { errorMap: (_issue, ctx) => ({ message: `expected an integer, got ${JSON.stringify(ctx.data)}` }) }
    )
    .pipe(
        z
            .number()
            .int({ message: 'expected an integer' })
            .min(0, { message: `must be between 0 and ${MAX_MIN_LENGTH}` })
            .max(MAX_MIN_LENGTH, { message: `must be between 0 and ${MAX_MIN_LENGTH}` })
    );

const policyKeysSchema = z.object({
    min_length: lengthSetting.optional(),
    require_upper: booleanSetting.optional(),
    require_lower: booleanSetting.optional(),
    require_digit: booleanSetting.optional(),
    require_special: booleanSetting.optional(),
    reject_username: booleanSetting.optional(),
    log_only: booleanSetting.optional(),
});

/**
 * Policy keys of one settings object, as `min_length` or `passgate.min_length`.
 * Other keys are ignored unless they use the reserved prefix.
 */
const policyOverridesSchema = z
    .record(z.string(), z.unknown(), { errorMap: () => ({ message: 'expected an object' }) })
    .superRefine((raw, ctx) => {
        for (const key of Object.keys(raw)) {
            if (key.startsWith(SETTING_PREFIX) && !isSettingName(key.slice(SETTING_PREFIX.length))) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'unrecognized setting' });
            }
        }
    })
    .transform((raw) => {
        const named: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(raw)) {
            const name = key.startsWith(SETTING_PREFIX) ? key.slice(SETTING_PREFIX.length) : key;
            if (isSettingName(name)) {
                named[name] = value;
            }
        }
        return named;
    })
    .pipe(policyKeysSchema)
    .transform((keys) => {
        const overrides: { -readonly [K in keyof PolicyConfig]?: PolicyConfig[K] } = {};
        if (keys.min_length !== undefined) overrides.minLength = keys.min_length;
        if (keys.require_upper !== undefined) overrides.requireUpper = keys.require_upper;
        if (keys.require_lower !== undefined) overrides.requireLower = keys.require_lower;
        if (keys.require_digit !== undefined) overrides.requireDigit = keys.require_digit;
        if (keys.require_special !== undefined) overrides.requireSpecial = keys.require_special;
        if (keys.reject_username !== undefined) overrides.rejectUsername = keys.reject_username;
        if (keys.log_only !== undefined) overrides.logOnly = keys.log_only;
        return Object.freeze(overrides);
    });

/**
 * Role overrides keyed by role name. Read entry by entry into a Map:
 * z.record drops a `__proto__` key, which is a legal role name.
 */
const rolesSchema = z
    .custom<Record<string, unknown>>(isRecord, { message: 'expected an object keyed by role name' })
    .transform((raw, ctx) => {
        const roles = new Map<string, Partial<PolicyConfig>>();
        for (const [role, roleRaw] of Object.entries(raw)) {
            const result = policyOverridesSchema.safeParse(roleRaw);
            if (!result.success) {
                for (const issue of result.error.issues) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [role, ...issue.path], message: issue.message });
                }
                continue;
            }
            roles.set(role, result.data);
        }
        return roles;
    });

const settingsSchema = z.object({
    roles: rolesSchema.optional(),
    logLevel: z.enum(LOG_LEVELS).default('warn'),
    report: z.enum(REPORT_MODES).default('first'),
});

/**
 * Name a failing setting the way an operator writes it.
 */
function settingPath(issuePath: ReadonlyArray<string | number>): string {
    if (issuePath.length === 0) {
        return '<root>';
    }
    return issuePath
        .map((segment, i) => {
            const name = String(segment);
            return i === issuePath.length - 1 && isSettingName(name) ? `${SETTING_PREFIX}${name}` : name;
        })
        .join('.');
}

function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const [issue] = result.error.issues;
        throw new PolicyConfigError(settingPath(issue.path), issue.message);
    }
    return result.data;
}

/**
 * Validate an already-parsed settings object.
 */
export function parseSettings(raw: unknown): PassgateSettings {
    const overrides = parseWith(policyOverridesSchema, raw);
    const { roles, logLevel, report } = parseWith(settingsSchema, raw);

    return {
        policy: createPolicyConfig(overrides),
        roles: roles ?? new Map<string, Partial<PolicyConfig>>(),
        logLevel,
        report,
    };
}

/**
 * Find the project root by looking for package.json.
 */
function findProjectRoot(startDir?: string): string | null {
    let dir = startDir || process.cwd();

    // Limit search depth to prevent infinite loops
    for (let i = 0; i < 10; i++) {
        if (fs.existsSync(path.join(dir, 'package.json'))) {
            return dir;
        }
        const parentDir = path.dirname(dir);
        if (parentDir === dir) {
            // Reached root
            break;
        }
        dir = parentDir;
    }

    return null;
}

/**
 * Load passgate.json from the project root.
 * A missing file yields the defaults.
 *
 * @param projectRoot Optional project root path (defaults to auto-detect)
 */
export function loadSettings(projectRoot?: string): PassgateSettings {
    const root = projectRoot || findProjectRoot() || process.cwd();
    const configPath = path.join(root, CONFIG_FILE);

    if (!fs.existsSync(configPath)) {
        return getDefaultSettings();
    }

    const content = fs.readFileSync(configPath, 'utf8');
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new PolicyConfigError(CONFIG_FILE, `not valid JSON (${reason})`);
    }

    return parseSettings(raw);
}

/**
 * Get the default settings.
 */
export function getDefaultSettings(): PassgateSettings {
    return DEFAULT_SETTINGS;
}

/**
 * Check if a passgate.json file exists in the project root.
 */
export function hasConfigFile(projectRoot?: string): boolean {
    const root = projectRoot || findProjectRoot() || process.cwd();
    return fs.existsSync(path.join(root, CONFIG_FILE));
}

/**
 * Effective policy for a role: global settings with the role's overrides on top.
 */
export function resolveConfig(settings: PassgateSettings, username: string | null): PolicyConfig {
    const overrides = username === null ? undefined : settings.roles.get(username);
    if (overrides === undefined) {
        return settings.policy;
    }
    return createPolicyConfig(overrides, settings.policy);
}
