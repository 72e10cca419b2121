/**
 * Error types thrown across the toolkit.
 *
 * Loaders do not throw for a single malformed asset; problems with one file
 * travel on the loaded asset and are reported by the linter. These errors
 * cover the cases where an operation cannot continue at all.
 */

export class PromptDeckError extends Error {
    constructor(message: string, readonly code: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ConfigError extends PromptDeckError {
    constructor(message: string, readonly configPath?: string) {
        super(configPath ? `${configPath}: ${message}` : message, 'E_CONFIG');
    }
}

export class NotFoundError extends PromptDeckError {
    constructor(readonly kind: string, readonly id: string) {
        super(`Unknown ${kind} "${id}"`, 'E_NOT_FOUND');
    }
}

export class RenderError extends PromptDeckError {
    constructor(message: string, readonly shellCommand?: string) {
        super(message, 'E_RENDER');
    }
}

export class ScaffoldError extends PromptDeckError {
    constructor(message: string) {
        super(message, 'E_SCAFFOLD');
    }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}
