/**
 * passgate Configuration Error
 * Raised for settings that cannot form a valid policy.
 */
export class PolicyConfigError extends Error {
    public readonly code: string = 'ERR_POLICY_CONFIG';
    public readonly setting: string;

    constructor(setting: string, message: string) {
        super(`[passgate] Invalid setting '${setting}': ${message}`);
        this.name = 'PolicyConfigError';
        this.setting = setting;
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PolicyConfigError);
        }
    }
}
