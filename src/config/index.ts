import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { TierPolicy } from '../types';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const TierPolicySchema = z.enum(['first-valid-tier', 'exhaustive']);

const EnvSchema = z.object({
    ROCKETREACH_API_KEY: z.string().optional(),
    ROCKETREACH_BASE_URL: z.string().url().default('https://api.rocketreach.co/v2'),
    AUTHORITY_TIMEOUT_MS: z.string().optional(),

    FETCH_TIMEOUT_MS: z.string().optional(),
    FETCH_CONCURRENCY: z.string().optional(),
    TIER_POLICY: TierPolicySchema.default('first-valid-tier'),
    EAGER_CANCEL: z.string().optional(),
    DEFAULT_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/, 'DEFAULT_COUNTRY_CODE must be 1-3 digits').default('1'),
    SOURCES_PATH: z.string().optional(),
    USER_AGENT: z.string().optional(),

    REQUESTS_PER_MINUTE: z.string().optional(),
});

type Env = Record<string, string | undefined>;

export interface Config {
    authority: {
        apiKey?: string;
        baseUrl: string;
        timeoutMs: number;
    };
    fetcher: {
        timeoutMs: number;
        concurrency: number;
        userAgent: string;
    };
    resolution: {
        tierPolicy: TierPolicy;
        eagerCancel: boolean;
        defaultCountryCode: string;
        sourcesPath: string;
    };
    cli: {
        requestsPerMinute: number;
    };
}

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36';

// src/config and dist/config both sit two levels below the project root
export const DEFAULT_SOURCES_PATH = path.resolve(__dirname, '../../config/sources.yaml');

function parseInteger(
    value: string | undefined,
    fallback: number,
    name: string,
    opts?: { min?: number; max?: number }
): number {
    if (value === undefined || value === '') {
        return fallback;
    }

    const n = Number.parseInt(value, 10);
    if (!Number.isFinite(n)) {
        throw new ConfigurationError(`${name} must be an integer`);
    }
    if (opts?.min !== undefined && n < opts.min) {
        throw new ConfigurationError(`${name} must be >= ${opts.min}`);
    }
    if (opts?.max !== undefined && n > opts.max) {
        throw new ConfigurationError(`${name} must be <= ${opts.max}`);
    }
    return n;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function buildConfig(env: Env): Config {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('\n');

        throw new ConfigurationError(`Invalid environment configuration:\n${issues}`);
    }

    const e = parsed.data;
    const apiKey = e.ROCKETREACH_API_KEY?.trim();

    return {
        authority: {
            apiKey: apiKey ? apiKey : undefined,
            baseUrl: e.ROCKETREACH_BASE_URL.replace(/\/+$/, ''),
            timeoutMs: parseInteger(e.AUTHORITY_TIMEOUT_MS, 10000, 'AUTHORITY_TIMEOUT_MS', { min: 100 }),
        },
        fetcher: {
            timeoutMs: parseInteger(e.FETCH_TIMEOUT_MS, 5000, 'FETCH_TIMEOUT_MS', { min: 100 }),
            concurrency: parseInteger(e.FETCH_CONCURRENCY, 8, 'FETCH_CONCURRENCY', { min: 1, max: 64 }),
            userAgent: e.USER_AGENT || DEFAULT_USER_AGENT,
        },
        resolution: {
            tierPolicy: e.TIER_POLICY,
            eagerCancel: parseBoolean(e.EAGER_CANCEL, false),
            defaultCountryCode: e.DEFAULT_COUNTRY_CODE,
            sourcesPath: e.SOURCES_PATH ? path.resolve(e.SOURCES_PATH) : DEFAULT_SOURCES_PATH,
        },
        cli: {
            requestsPerMinute: parseInteger(e.REQUESTS_PER_MINUTE, 30, 'REQUESTS_PER_MINUTE', { min: 1 }),
        },
    };
}

let configInstance: Config | null = null;

export const loadConfig = (env: Env = process.env): Config => {
    configInstance = buildConfig(env);
    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig();
    }
    return configInstance;
};

export const resetConfig = (): void => {
    configInstance = null;
};
