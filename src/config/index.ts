/**
 * Configuration module
 * Reads the YAML config file, applies environment overrides and validates the result.
 */

import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { GITHUB_COM_API_URL } from '../CONSTS.js';
import { formatZodError } from '../lib/zod.js';

const PositiveIntSchema = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
    github: z.object({
        baseUrl: z.string().url().default(GITHUB_COM_API_URL),
        /** Organization slug, e.g. `acme` for https://github.com/acme. */
        organization: z.string().min(1, 'must not be empty'),
        appId: z
            .union([
                z.string().regex(/^\d+$/, 'must be numeric'),
                z.number().int().positive(),
            ])
            .transform(String),
        installationId: PositiveIntSchema.optional(),
        privateKeyPath: z.string().min(1, 'must not be empty'),
        webhookSecret: z.string().min(1, 'must not be empty'),
    }),
    server: z
        .object({
            host: z.string().min(1).default('127.0.0.1'),
            port: z.coerce.number().int().min(0).max(65_535).default(2342),
        })
        .default({}),
    auth: z
        .object({
            clockSkewSeconds: z.coerce.number().int().min(0).max(300).default(60),
            assertionLifetimeSeconds: z.coerce.number().int().min(60).max(600).default(600),
            renewalMarginSeconds: z.coerce.number().int().min(0).max(1_800).default(60),
            exchangeTimeoutMs: PositiveIntSchema.default(10_000),
        })
        .default({}),
    requests: z
        .object({
            timeoutMs: PositiveIntSchema.default(15_000),
            maxAttempts: z.coerce.number().int().min(1).max(10).default(4),
            baseDelayMs: PositiveIntSchema.default(1_000),
            maxDelayMs: PositiveIntSchema.default(60_000),
            jitterRatio: z.coerce.number().min(0).max(1).default(0.2),
        })
        .default({}),
    webhook: z
        .object({
            maxBodyBytes: PositiveIntSchema.default(256 * 1024),
            /** Ceiling for the background work a single delivery triggers. */
            handlingTimeoutMs: PositiveIntSchema.default(5 * 60 * 1000),
        })
        .default({}),
    protection: z
        .object({
            requiredApprovingReviewCount: z.coerce.number().int().min(1).max(6).default(1),
        })
        .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
    const existing = raw[key];
    const copy: RawConfig = isRecord(existing) ? { ...existing } : {};
    raw[key] = copy;
    return copy;
}

function setIfPresent(target: RawConfig, key: string, value: string | undefined): void {
    const trimmed = value?.trim();
    if (trimmed) target[key] = trimmed;
}

/**
 * Environment variables win over the file so secrets can stay out of it.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): RawConfig {
    const merged: RawConfig = isRecord(raw) ? { ...raw } : {};

    const github = section(merged, 'github');
    setIfPresent(github, 'baseUrl', env.GITHUB_API_URL);
    setIfPresent(github, 'organization', env.GITHUB_ORGANIZATION);
    setIfPresent(github, 'appId', env.GITHUB_APP_ID);
    setIfPresent(github, 'installationId', env.GITHUB_INSTALLATION_ID);
    setIfPresent(github, 'privateKeyPath', env.GITHUB_PRIVATE_KEY_PATH);
    setIfPresent(github, 'webhookSecret', env.GITHUB_WEBHOOK_SECRET);

    const server = section(merged, 'server');
    setIfPresent(server, 'host', env.HOST);
    setIfPresent(server, 'port', env.PORT);

    return merged;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): AppConfig {
    const parsed = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error).error}`, {
            cause: parsed.error,
        });
    }
    return parsed.data;
}

export function loadConfig(options?: { path?: string; env?: NodeJS.ProcessEnv }): AppConfig {
    const env = options?.env ?? process.env;
    const path = options?.path ?? (env.CONFIG_PATH?.trim() || 'config.yaml');

    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (err) {
        throw new ConfigError(`Could not read config file at ${path}`, { cause: err });
    }

    let raw: unknown;
    try {
        raw = parseYaml(text);
    } catch (err) {
        throw new ConfigError(`Could not parse config file at ${path}`, { cause: err });
    }

    return parseConfig(raw, env);
}

/**
 * Loads `.env` into `process.env` (existing variables are kept) and then the config file.
 */
export function loadConfigFromEnvironment(): AppConfig {
    dotenv.config();
    return loadConfig();
}
