/**
 * Application error classes.
 * Every error carries a stable code; `fatal` errors stop the run before any output is written.
 */

export class AppError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }

    get fatal(): boolean {
        return this.context?.fatal !== false;
    }
}

export class InputFileNotFoundError extends AppError {
    constructor(public filePath: string) {
        super(`El archivo '${filePath}' no existe.`, 'INPUT_NOT_FOUND', { filePath, fatal: true });
    }
}

export class DecodeError extends AppError {
    constructor(filePath: string, encodings: readonly string[]) {
        super(
            `No se pudo leer el archivo '${filePath}' con las codificaciones probadas: ${encodings.join(', ')}`,
            'DECODE_ERROR',
            { filePath, encodings: [...encodings], fatal: true }
        );
    }
}

export class CsvParseError extends AppError {
    constructor(filePath: string, reason: string) {
        super(`CSV inválido en '${filePath}': ${reason}`, 'CSV_PARSE_ERROR', { filePath, fatal: true });
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class OptionalDependencyError extends AppError {
    constructor(public packageName: string, cause?: unknown) {
        super(`Optional dependency '${packageName}' is not installed. Install it with: npm install ${packageName}`, 'OPTIONAL_DEPENDENCY_MISSING', {
            packageName,
            cause: cause instanceof Error ? cause.message : cause,
            fatal: false
        });
    }
}
