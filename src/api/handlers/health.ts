import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { ConversationScheduler } from '../../services/conversation-scheduler.js';
import type { JobScheduler } from '../../services/job-scheduler.js';
import type { PriceCache } from '../../services/price-cache.js';
import type { StatsTracker } from '../../services/stats-tracker.js';
import type { MarketValue } from '../../types/market.js';
import { sendOk } from '../shared.js';

export interface HealthDeps {
    scheduler: ConversationScheduler;
    jobs: JobScheduler;
    priceCache: PriceCache<MarketValue>;
    stats?: StatsTracker;
    startedAt?: number;
    now?: () => number;
}

/** GET /health: Pipeline load, cache size and maintenance job status. */
export function handleHealth(deps: HealthDeps) {
    const now = deps.now ?? Date.now;
    const startedAt = deps.startedAt ?? now();

    return (_req: Request, res: Response): void => {
        const jobs = deps.jobs.listJobs();
        const stats = deps.stats?.snapshot();

        const data: HealthData = {
            status: jobs.some((job) => job.status === 'error') ? 'degraded' : 'ok',
            uptimeSec: Math.floor((now() - startedAt) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            pipeline: {
                activeWorkers: deps.scheduler.activeCount,
                pendingMessages: deps.scheduler.pendingCount,
            },
            priceCache: {
                entries: deps.priceCache.size,
                inFlight: deps.priceCache.inFlightCount,
            },
            jobs: jobs.map((job) => ({
                id: job.id,
                status: job.status,
                lastRunAt: job.lastRunAt ? job.lastRunAt.toISOString() : null,
                lastError: job.lastError,
            })),
            messages: stats ? { received: stats.received, sent: stats.sent, dropped: stats.dropped } : undefined,
        };

        sendOk(res, data);
    };
}

/** GET /health/live: Process is up. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'alive' });
    };
}
