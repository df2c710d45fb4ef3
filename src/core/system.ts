/**
 * System Scheduler
 *
 * Manages system registration and execution in ordered phases.
 * Systems are synchronous functions; each phase runs to completion before
 * the next one starts.
 */

import { type SystemPhase, SYSTEM_PHASES } from './constants';

export interface SystemOptions {
    /** Execution phase (default: 'update') */
    phase?: SystemPhase;

    /** Execution order within phase (lower = earlier) */
    order?: number;

    /** Run condition, evaluated right before the system would run */
    runIf?: () => boolean;
}

export type SystemFn = () => void;

interface SystemEntry {
    fn: SystemFn;
    options: SystemOptions;
    order: number;
    seq: number;
}

/**
 * System scheduler - manages system registration and execution.
 */
export class SystemScheduler {
    /** Systems organized by phase */
    private systems: Map<SystemPhase, SystemEntry[]> = new Map();

    /** Registration counter, breaks ties between equal orders */
    private nextSystemId: number = 0;

    constructor() {
        // Initialize all phases
        for (const phase of SYSTEM_PHASES) {
            this.systems.set(phase, []);
        }
    }

    /**
     * Add a system to the scheduler.
     *
     * @param fn System function to execute
     * @param options System options (phase, order, runIf)
     * @returns Function to remove the system
     */
    add(fn: SystemFn, options: SystemOptions = {}): () => void {
        const phase = options.phase ?? 'update';
        const systems = this.systems.get(phase);

        if (!systems) {
            throw new Error(`Unknown system phase: ${phase}`);
        }

        const seq = this.nextSystemId++;
        const entry: SystemEntry = {
            fn,
            options,
            order: options.order ?? 0,
            seq
        };

        systems.push(entry);

        // Sort by order, then registration
        systems.sort((a, b) => a.order - b.order || a.seq - b.seq);

        // Return removal function
        return () => this.remove(fn);
    }

    /**
     * Remove a system from the scheduler.
     */
    remove(fn: SystemFn): boolean {
        for (const systems of this.systems.values()) {
            const index = systems.findIndex(s => s.fn === fn);
            if (index !== -1) {
                systems.splice(index, 1);
                return true;
            }
        }
        return false;
    }

    /**
     * Run all systems in a specific phase.
     */
    runPhase(phase: SystemPhase): void {
        const systems = this.systems.get(phase);
        if (!systems) return;

        // Copy: a system may add or remove systems while the phase runs
        for (const system of [...systems]) {
            if (system.options.runIf && !system.options.runIf()) continue;

            // Execute system
            try {
                const result: unknown = system.fn();

                // Check for accidental async systems
                if (result && typeof result === 'object' && 'then' in result) {
                    throw new Error(
                        `System returned a Promise. Async systems are not allowed ` +
                        `as phases must run to completion. Remove 'async' from your system.`
                    );
                }
            } catch (error) {
                console.error(`Error in system during '${phase}' phase:`, error);
                throw error;
            }
        }
    }

    /**
     * Run all phases in order.
     */
    runAll(): void {
        for (const phase of SYSTEM_PHASES) {
            this.runPhase(phase);
        }
    }
}
