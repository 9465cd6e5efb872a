/**
 * Account Service - Configuration Error
 *
 * Thrown when a flow is started without the configuration it needs
 * (e.g. Google client credentials). Never cached, never retried.
 */

export class ConfigurationError extends Error {
    /** Name of the missing or invalid setting */
    readonly setting: string;

    constructor(setting: string, message?: string) {
        super(message ?? `Missing required configuration: ${setting}`);
        this.name = 'ConfigurationError';
        this.setting = setting;
    }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
    return err instanceof ConfigurationError;
}
