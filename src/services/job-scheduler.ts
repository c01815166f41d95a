import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';

export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

export interface JobDefinition {
    /** Unique name, e.g. 'context-sweep'. */
    id: string;
    /** node-cron expression. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /** @default true */
    autoStart?: boolean;
}

/** Point-in-time view of a job, as reported by /health. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

interface JobEntry {
    definition: JobDefinition;
    task: ScheduledTask | null;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    inFlight: Promise<void> | null;
}

/**
 * Named cron jobs for background maintenance (idle-context sweeps, cache
 * pruning). A failing run is recorded on the job and logged; the schedule
 * keeps going and the other jobs are unaffected.
 *
 * ```ts
 * const jobs = new JobScheduler();
 * jobs.register({
 *   id: 'context-sweep',
 *   cronExpression: '0 * * * *',
 *   description: 'Delete idle conversation contexts',
 *   handler: async () => { await store.sweepIdle(); },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, JobEntry> = new Map();

    /** Throws on a duplicate ID or an invalid cron expression. */
    register(definition: JobDefinition): void {
        if (this.#jobs.has(definition.id)) {
            throw new Error(`[JobScheduler] Job '${definition.id}' is already registered.`);
        }
        if (!cron.validate(definition.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${definition.id}': ${definition.cronExpression}`,
            );
        }

        const entry: JobEntry = {
            definition,
            task: null,
            status: 'stopped',
            lastRunAt: null,
            lastError: null,
            inFlight: null,
        };
        this.#jobs.set(definition.id, entry);

        if (definition.autoStart ?? true) {
            this.#schedule(entry);
        }
    }

    startAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#schedule(entry);
        }
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            entry.task?.stop();
            entry.task = null;
            if (entry.status !== 'error') entry.status = 'stopped';
        }
    }

    /**
     * Run a job immediately, outside its schedule. A run already in progress
     * is joined rather than started twice.
     */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#run(entry);
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => ({
            id: entry.definition.id,
            cronExpression: entry.definition.cronExpression,
            description: entry.definition.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
        }));
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #schedule(entry: JobEntry): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.definition.cronExpression, async () => {
            await this.#run(entry);
        });
        if (entry.status !== 'error') entry.status = 'idle';
    }

    #run(entry: JobEntry): Promise<void> {
        entry.inFlight ??= this.#invoke(entry).finally(() => {
            entry.inFlight = null;
        });
        return entry.inFlight;
    }

    async #invoke(entry: JobEntry): Promise<void> {
        const { id, handler } = entry.definition;
        entry.status = 'running';
        entry.lastRunAt = new Date();

        try {
            await handler();
            entry.lastError = null;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.lastError = message;
            console.error(`[JobScheduler] Job '${id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${id}' failed: ${message}`);
        } finally {
            entry.status = entry.lastError ? 'error' : entry.task ? 'idle' : 'stopped';
        }
    }
}
