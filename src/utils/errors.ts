import { FetchErrorKind } from '../types';

/**
 * Standardized error classes for the resolver.
 * None of them escape a query: the pool and the authority client convert
 * their own errors into absent evidence.
 */
export class ResolverError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class NetworkError extends ResolverError {
    constructor(message: string, public kind: FetchErrorKind, context?: Record<string, unknown>) {
        super(message, 'NETWORK_ERROR', { ...context, kind });
    }
}

export class AuthoritativeUnavailableError extends ResolverError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'AUTHORITY_UNAVAILABLE', context);
    }
}

export class ConfigurationError extends ResolverError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class ValidationError extends ResolverError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { ...context, fatal: false });
    }
}
