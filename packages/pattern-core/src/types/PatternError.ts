export type PatternErrorKind =
    | 'DimensionMismatch'
    | 'InvalidPixelValue'
    | 'InvalidParameter'
    | 'UnsupportedVersion'
    | 'ChecksumMismatch'
    | 'ParityMismatch'
    | 'UnregisteredId';

export class PatternError extends Error {
    readonly kind: PatternErrorKind;

    constructor(kind: PatternErrorKind, message: string) {
        super(`${kind}: ${message}`);
        this.name = 'PatternError';
        this.kind = kind;
    }
}

export function isPatternError(e: unknown, kind?: PatternErrorKind): e is PatternError {
    return e instanceof PatternError && (kind === undefined || e.kind === kind);
}

export function invalidParameter(message: string): never {
    throw new PatternError('InvalidParameter', message);
}
