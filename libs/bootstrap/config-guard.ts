import { logger } from '../logging/logger.js';
import { CoreError } from '../errors/CoreError.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'forbidIf'; name: string; when: (env: EnvSource) => boolean; message: string }
    | { type: 'assert'; check: (env: EnvSource) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * Every rule is evaluated; all violations are reported together.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: EnvSource = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check MESHVAULT_* environment variables."
            }, "Configuration Guard Violation");

            throw new CoreError('InvalidConfig', errors.join('; '));
        }

        logger.debug("Configuration guard passed.");
    }
}
