/**
 * Save/load requests.
 *
 * A single pending request, installed by application code and consumed by
 * the save or load executor in the next matching phase.
 */

/** Which entities a save captures. */
export type SaveMode =
    /** Entities carrying Persist */
    | 'filtered'
    /** Every live entity; for inspection, not meant to be loaded back */
    | 'dump';

export type Request =
    | { kind: 'save'; path: string; mode: SaveMode }
    | { kind: 'load'; path: string };

/**
 * Single-slot command queue.
 *
 * Last write wins: installing a request while another one is pending
 * replaces it (and logs a warning). Callers must not rely on both running.
 */
export class RequestSlot {
    private pending: Request | null = null;

    /**
     * Request a filtered save to `path`.
     */
    save(path: string): void {
        this.install({ kind: 'save', path, mode: 'filtered' });
    }

    /**
     * Request a dump of every entity to `path`.
     */
    dump(path: string): void {
        this.install({ kind: 'save', path, mode: 'dump' });
    }

    /**
     * Request a load from `path`.
     */
    load(path: string): void {
        this.install({ kind: 'load', path });
    }

    peek(): Request | null {
        return this.pending;
    }

    shouldSave(): boolean {
        return this.pending?.kind === 'save';
    }

    shouldLoad(): boolean {
        return this.pending?.kind === 'load';
    }

    /**
     * Remove and return the pending request.
     */
    take(): Request | null {
        const request = this.pending;
        this.pending = null;
        return request;
    }

    clear(): void {
        this.pending = null;
    }

    private install(request: Request): void {
        if (this.pending) {
            console.warn(
                `[requests] ${describeRequest(request)} replaces pending ${describeRequest(this.pending)}`
            );
        }
        this.pending = request;
    }
}

export function describeRequest(request: Request): string {
    if (request.kind === 'load') {
        return `load '${request.path}'`;
    }
    return `${request.mode === 'dump' ? 'dump' : 'save'} '${request.path}'`;
}

/**
 * Completion hooks. Save and load are fire-and-forget; these are the only
 * way besides the logs to learn how a request ended.
 */
export interface SaveCallbacks {
    /** A save or dump finished writing `path`. */
    onSave?: (path: string, entityCount: number) => void;
    /** A load from `path` finished, after its postLoad phase. */
    onLoad?: (path: string, entityCount: number) => void;
    /** A request failed; the error is also logged. */
    onError?: (request: Request, error: unknown) => void;
}
