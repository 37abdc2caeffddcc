/**
 * Configuration Errors
 * Every failure the engine can raise carries a stable code so callers can branch on it.
 */

export type ConfigErrorCode =
    | 'ERR_MISSING_DEFAULT'
    | 'ERR_TYPE_CONVERSION'
    | 'ERR_CONSTRAINT_VIOLATION'
    | 'ERR_UNSUPPORTED_VERSION'
    | 'ERR_UNKNOWN_SETTING'
    | 'ERR_STORAGE';

export class ConfigError extends Error {
    readonly code: ConfigErrorCode;

    constructor(code: ConfigErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** No default value resolves for a parameter on the requested network */
export class MissingDefaultError extends ConfigError {
    constructor(readonly parameterId: string, readonly network: string) {
        super('ERR_MISSING_DEFAULT', `No default for [${parameterId}] on network [${network}]`);
    }
}

/** A stored string cannot be read as the parameter's declared type */
export class TypeConversionError extends ConfigError {
    constructor(readonly parameterId: string, readonly raw: string, readonly expected: string) {
        super('ERR_TYPE_CONVERSION', `Value "${raw}" for [${parameterId}] is not a valid ${expected}`);
    }
}

/** A typed value fails the parameter's regex, length or range constraint */
export class ConstraintViolationError extends ConfigError {
    constructor(readonly parameterId: string, readonly reason: string) {
        super('ERR_CONSTRAINT_VIOLATION', `Invalid value for [${parameterId}]: ${reason}`);
    }
}

/** The document was written by a newer engine, or its version stamp is unreadable */
export class UnsupportedVersionError extends ConfigError {
    constructor(readonly version: string, readonly latest: number) {
        super('ERR_UNSUPPORTED_VERSION', `Settings version "${version}" is not supported (latest known: v${latest})`);
    }
}

/** Lookup of a section or parameter that does not exist */
export class UnknownSettingError extends ConfigError {
    constructor(readonly section: string, readonly parameterId?: string) {
        super(
            'ERR_UNKNOWN_SETTING',
            parameterId === undefined
                ? `Unknown section [${section}]`
                : `Unknown setting [${section}.${parameterId}]`
        );
    }
}

/** Reading or writing the settings file failed */
export class StorageError extends ConfigError {
    constructor(message: string, readonly path: string, cause?: unknown) {
        super('ERR_STORAGE', message, { cause });
    }
}

export function isConfigError(error: unknown): error is ConfigError {
    return error instanceof ConfigError;
}
