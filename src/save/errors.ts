/**
 * Save/load failure taxonomy.
 *
 * - ERR_IO: opening, reading, creating, writing or renaming a file failed
 * - ERR_FORMAT: the text is not a well-formed scene
 * - ERR_SCHEMA: the scene names a component type or field the registry does not know
 * - ERR_MISSING_ENTITY: a reference could not be resolved after a load
 */
export type SceneErrorCode = 'ERR_IO' | 'ERR_FORMAT' | 'ERR_SCHEMA' | 'ERR_MISSING_ENTITY';

export class SceneError extends Error {
    public readonly code: SceneErrorCode;

    constructor(code: SceneErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SceneError';
        this.code = code;
    }
}

/**
 * Wrap an unknown thrown value as an ERR_IO SceneError, keeping the cause.
 */
export function ioError(action: string, path: string, cause: unknown): SceneError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SceneError('ERR_IO', `${action} '${path}' failed: ${reason}`, { cause });
}
