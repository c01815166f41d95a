import { createServer, type Server } from 'node:http';
import express, { type Express, type Router } from 'express';
import { handleHealth, handleLiveness, type HealthDeps } from './handlers/health.js';
import { requestLogger, sendError } from './shared.js';

export interface ApiAppDeps {
    health: HealthDeps;
    /** Webhook routers contributed by adapters, mounted at the root. */
    webhooks?: Router[];
}

/**
 * Build the HTTP app.
 *
 * Endpoints:
 *   GET  /health           Pipeline, cache and job status
 *   GET  /health/live      Liveness check
 *   POST /webhooks/twilio  Twilio inbound messages (when enabled)
 */
export function createApiApp(deps: ApiAppDeps): Express {
    const app = express();
    app.use(requestLogger);

    app.get('/health', handleHealth(deps.health));
    app.get('/health/live', handleLiveness());

    for (const webhook of deps.webhooks ?? []) {
        app.use(webhook);
    }

    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Listen on `port`; resolves once the socket is bound. */
export function startApiServer(app: Express, port: number): Promise<Server> {
    const server = createServer(app);
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            console.log(`[API] Listening on port ${port}.`);
            resolve(server);
        });
    });
}
