import { logThought } from '../utils/logger.js';
import type { ContextStore } from './context-store.js';
import type { JobScheduler } from './job-scheduler.js';
import type { MarketQuotes } from './market-data.js';

export interface MaintenanceTargets {
    contextStore: ContextStore;
    marketQuotes: MarketQuotes;
}

export interface MaintenanceSchedule {
    sweepCron: string;
    pruneCron: string;
}

export const CONTEXT_SWEEP_JOB = 'context-sweep';
export const CACHE_PRUNE_JOB = 'price-cache-prune';

/** Register the periodic clean-up jobs. They start with the scheduler. */
export function registerMaintenanceJobs(
    scheduler: JobScheduler,
    targets: MaintenanceTargets,
    schedule: MaintenanceSchedule,
): void {
    scheduler.register({
        id: CONTEXT_SWEEP_JOB,
        cronExpression: schedule.sweepCron,
        description: 'Delete conversation contexts idle past their TTL',
        autoStart: false,
        handler: async () => {
            await targets.contextStore.sweepIdle();
        },
    });

    scheduler.register({
        id: CACHE_PRUNE_JOB,
        cronExpression: schedule.pruneCron,
        description: 'Drop price/FX cache entries too old to serve',
        autoStart: false,
        handler: () => {
            const removed = targets.marketQuotes.pruneCache();
            if (removed > 0) {
                void logThought(`[Maintenance] Pruned ${removed} expired cache entr${removed === 1 ? 'y' : 'ies'}.`);
            }
        },
    });
}
