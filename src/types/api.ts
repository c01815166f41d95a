/** Standard JSON envelope for every API response. */
export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    pipeline: {
        activeWorkers: number;
        pendingMessages: number;
    };
    priceCache: {
        entries: number;
        inFlight: number;
    };
    jobs: Array<{
        id: string;
        status: 'idle' | 'running' | 'stopped' | 'error';
        lastRunAt: string | null;
        lastError: string | null;
    }>;
    messages?: {
        received: number;
        sent: number;
        dropped: number;
    };
}
