/** Invalid watch settings or configuration value. Raised at load/construction time. */
export class ConfigError extends Error {
    readonly key: string | undefined;

    constructor(message: string, key?: string) {
        super(message);
        this.name = 'ConfigError';
        this.key = key;
    }
}

/** Filesystem failure while scanning one watched directory. */
export class ScanError extends Error {
    readonly root: string;

    constructor(message: string, root: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ScanError';
        this.root = root;
    }
}

export type DeliveryFailureKind = 'transient_exhausted' | 'rejected';

/** A message could not be delivered: retries ran out, or the endpoint refused it. */
export class DeliveryError extends Error {
    readonly kind: DeliveryFailureKind;
    readonly attempts: number;
    readonly detail: string;

    constructor(kind: DeliveryFailureKind, detail: string, attempts: number) {
        super(
            kind === 'rejected'
                ? `Message rejected by remote endpoint: ${detail}`
                : `Delivery failed after ${attempts} attempts: ${detail}`,
        );
        this.name = 'DeliveryError';
        this.kind = kind;
        this.attempts = attempts;
        this.detail = detail;
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
    return err instanceof Error && err.name === 'AbortError';
}

/** Node errno code of a filesystem error, if it has one. */
export function errnoCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
    const code = err.code;
    return typeof code === 'string' ? code : undefined;
}
