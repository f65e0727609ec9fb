export type AppEnv = 'dev' | 'staging' | 'production';

function parseAppEnv(value: string | undefined): AppEnv {
    const normalized = value?.trim().toLowerCase() ?? '';
    // Unset means a deployed instance.
    if (!normalized) return 'production';
    if (normalized === 'dev' || normalized === 'staging' || normalized === 'production') {
        return normalized;
    }

    throw new Error('APP_ENV must be one of: dev, staging, production');
}

export function getAppEnv(): AppEnv {
    return parseAppEnv(process.env.APP_ENV);
}

export function isDevEnv(): boolean {
    return getAppEnv() === 'dev';
}
