/**
 * Category of a revert. Callers branch on this instead of matching messages.
 */
export type RevertKind =
    | 'unauthorized'
    | 'state'
    | 'validation'
    | 'insufficient-balance'
    | 'gate'
    | 'arithmetic'
    | 'call';

/**
 * Thrown by contracts and by the host to abort the current transaction.
 * The host rolls back every state change made since the outer call began.
 */
export class Revert extends Error {
    public readonly kind: RevertKind;

    public constructor(message: string, kind: RevertKind = 'call') {
        super(message);
        this.name = 'Revert';
        this.kind = kind;
    }
}

/** Human-readable form used by the scripts when a transaction fails. */
export function describeRevert(err: unknown): string {
    if (err instanceof Revert) {
        return `[${err.kind}] ${err.message}`;
    }
    if (err instanceof Error) {
        return err.message;
    }
    return String(err);
}
