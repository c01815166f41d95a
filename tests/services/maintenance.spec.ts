import { afterEach, describe, expect, it, vi } from 'vitest';
import { ContextStore, InMemoryContextBackend } from '../../src/services/context-store.js';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import { CACHE_PRUNE_JOB, CONTEXT_SWEEP_JOB, registerMaintenanceJobs } from '../../src/services/maintenance.js';
import { MarketQuotes } from '../../src/services/market-data.js';
import { PriceCache } from '../../src/services/price-cache.js';
import type { MarketDataSource, MarketValue } from '../../src/types/market.js';
import { logThought } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    logDrop: vi.fn(async () => undefined),
    scrubSensitiveText: (text: string) => text,
}));

function setup() {
    let now = 0;
    const clock = () => now;
    const backend = new InMemoryContextBackend();
    const contextStore = new ContextStore({ backend, idleTtlMs: 60_000, now: clock });
    const source: MarketDataSource = {
        fetchPrice: async () => ({ price: 1, change24h: null, volume24h: null }),
        fetchFx: async () => 2,
    };
    const marketQuotes = new MarketQuotes(source, new PriceCache<MarketValue>({ ttlMs: 1_000, now: clock }));
    const jobs = new JobScheduler();
    registerMaintenanceJobs(jobs, { contextStore, marketQuotes }, { sweepCron: '0 * * * *', pruneCron: '*/10 * * * *' });

    return {
        backend,
        contextStore,
        marketQuotes,
        jobs,
        advance: (ms: number) => {
            now += ms;
        },
    };
}

describe('registerMaintenanceJobs', () => {
    afterEach(() => {
        vi.mocked(logThought).mockClear();
    });

    it('registers both jobs stopped until the scheduler starts', () => {
        const { jobs } = setup();

        expect(jobs.listJobs().map((job) => [job.id, job.cronExpression, job.status])).toEqual([
            [CONTEXT_SWEEP_JOB, '0 * * * *', 'stopped'],
            [CACHE_PRUNE_JOB, '*/10 * * * *', 'stopped'],
        ]);
    });

    it('sweeps rooms idle past their TTL', async () => {
        const { backend, contextStore, jobs, advance } = setup();
        await contextStore.append('telegram:-100', {
            role: 'user',
            senderId: '7',
            senderName: 'alice',
            text: 'hello',
            timestamp: 0,
        });
        advance(30_000);
        await contextStore.append('discord:9', {
            role: 'user',
            senderId: '8',
            senderName: 'bob',
            text: 'hi',
            timestamp: 30_000,
        });
        advance(30_000);

        await jobs.runNow(CONTEXT_SWEEP_JOB);

        expect(await backend.keys()).toEqual(['discord:9']);
    });

    it('prunes expired cache entries and logs the count', async () => {
        const { marketQuotes, jobs, advance } = setup();
        await marketQuotes.price('BTC', 'USD');
        await marketQuotes.rate('EUR', 'USD');
        advance(1_000);

        await jobs.runNow(CACHE_PRUNE_JOB);

        expect(logThought).toHaveBeenCalledWith('[Maintenance] Pruned 2 expired cache entries.');
        expect(jobs.listJobs().find((job) => job.id === CACHE_PRUNE_JOB)?.lastError).toBeNull();
    });

    it('stays quiet when nothing expired', async () => {
        const { marketQuotes, jobs } = setup();
        await marketQuotes.price('BTC', 'USD');

        await jobs.runNow(CACHE_PRUNE_JOB);

        expect(logThought).not.toHaveBeenCalled();
    });
});
