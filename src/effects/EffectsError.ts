/**
 * Several infrastructure failures reported as one, e.g. a failed transaction
 * whose rollback failed as well.
 */
export class EffectsError extends Error {
    readonly causes: Error[];

    constructor(causes: unknown[]) {
        const errors = causes.map(toError);
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.causes = errors;
    }
}

export function toError(cause: unknown): Error {
    return cause instanceof Error ? cause : new Error(String(cause));
}
