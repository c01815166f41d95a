import 'dotenv/config';
import type { Server } from 'node:http';
import { createApiApp, startApiServer } from './api/router.js';
import { loadConfig, type AssistantConfig } from './config/json-config.js';
import { Gateway } from './core/gateway.js';
import { ResponseDispatcher } from './core/response-dispatcher.js';
import { DiscordAdapter } from './interfaces/discord_handler.js';
import { InterfaceDispatcher } from './interfaces/dispatcher.js';
import { TelegramAdapter } from './interfaces/telegram_handler.js';
import { TwilioAdapter } from './interfaces/twilio_handler.js';
import { ContextStore, InMemoryContextBackend } from './services/context-store.js';
import { openDatabase, type SqliteDatabase } from './services/db.js';
import { IntentRouter } from './services/intent-router.js';
import { JobScheduler } from './services/job-scheduler.js';
import { createLanguageModel } from './services/llm-client.js';
import { registerMaintenanceJobs } from './services/maintenance.js';
import { HttpMarketDataSource, MarketQuotes } from './services/market-data.js';
import { ImgflipMemeBackend } from './services/meme-service.js';
import { Normalizer } from './services/normalizer.js';
import { PriceCache } from './services/price-cache.js';
import { ReactionPicker } from './services/reactions.js';
import { JinaSearchBackend } from './services/search-client.js';
import { SqliteContextBackend } from './services/sqlite-context-backend.js';
import { StatsTracker } from './services/stats-tracker.js';
import type { MarketValue } from './types/market.js';
import type { MessagingAdapter } from './types/messaging.js';
import { logThought } from './utils/logger.js';

function createAdapters(config: AssistantConfig): { adapters: MessagingAdapter[]; twilio: TwilioAdapter | null } {
    const { telegram, discord, twilio } = config.messaging;
    const adapters: MessagingAdapter[] = [];

    if (telegram.enabled && telegram.botToken) {
        adapters.push(new TelegramAdapter(telegram.botToken, { allowedChats: telegram.allowedChats }));
    } else if (telegram.enabled) {
        console.warn('[Assistant] Telegram is enabled but TELEGRAM_BOT_TOKEN is empty; skipping.');
    }

    if (discord.enabled && discord.botToken) {
        adapters.push(new DiscordAdapter(discord.botToken, { allowedGuilds: discord.allowedGuilds }));
    } else if (discord.enabled) {
        console.warn('[Assistant] Discord is enabled but DISCORD_TOKEN is empty; skipping.');
    }

    let twilioAdapter: TwilioAdapter | null = null;
    if (twilio.enabled && twilio.accountSid && twilio.authToken) {
        twilioAdapter = new TwilioAdapter({
            accountSid: twilio.accountSid,
            authToken: twilio.authToken,
            whatsappNumber: twilio.whatsappNumber,
            messengerPageId: twilio.messengerPageId,
            instagramAccountId: twilio.instagramAccountId,
        });
        adapters.push(twilioAdapter);
    } else if (twilio.enabled) {
        console.warn('[Assistant] Twilio is enabled but its account SID or auth token is empty; skipping.');
    }

    return { adapters, twilio: twilioAdapter };
}

async function main(): Promise<void> {
    const config = await loadConfig();
    const startedAt = Date.now();
    const db: SqliteDatabase = openDatabase(config.storage.databasePath);

    // ── Pipeline Services ───────────────────────────────────────────────────────

    const contextStore = new ContextStore({
        backend: config.context.backend === 'sqlite' ? new SqliteContextBackend(db) : new InMemoryContextBackend(),
        historyLimit: config.context.historyLimit,
        topicDecay: config.context.topicDecay,
        topTopics: config.context.topTopics,
        idleTtlMs: config.context.idleTtlSeconds * 1000,
    });

    const priceCache = new PriceCache<MarketValue>({
        ttlMs: config.market.priceCacheTtlSeconds * 1000,
        fetchTimeoutMs: config.market.fetchTimeoutSeconds * 1000,
        serveStaleOnError: config.market.serveStaleOnError,
        maxStaleMs: config.market.maxStaleSeconds * 1000,
    });
    const marketQuotes = new MarketQuotes(new HttpMarketDataSource(), priceCache);
    const stats = new StatsTracker(db);

    const search = config.search.enabled ? new JinaSearchBackend({ apiKey: config.search.jinaApiKey }) : undefined;
    const meme = config.meme.enabled
        ? new ImgflipMemeBackend({ username: config.meme.imgflipUsername, password: config.meme.imgflipPassword })
        : undefined;

    const responseDispatcher = new ResponseDispatcher(
        { contextStore, marketQuotes, llm: createLanguageModel(config), search, meme, stats },
        {
            botName: config.bot.name,
            personality: config.bot.personality,
            helpPrefix: config.bot.commandPrefixes[0],
            filteredWords: config.bot.filteredWords,
            searchEnabled: config.search.enabled,
            llmTimeoutMs: config.pipeline.llmTimeoutSeconds * 1000,
            searchTimeoutMs: config.search.timeoutSeconds * 1000,
            operationTimeoutMs: config.pipeline.operationTimeoutMs,
        },
    );

    const gateway = new Gateway(
        contextStore,
        new IntentRouter({ botName: config.bot.name, commandPrefixes: config.bot.commandPrefixes }),
        responseDispatcher,
        { operationTimeoutMs: config.pipeline.operationTimeoutMs },
    );

    // ── Messaging ───────────────────────────────────────────────────────────────

    const { adapters, twilio } = createAdapters(config);
    if (adapters.length === 0) {
        console.warn('[Assistant] No messaging platform is enabled; only the HTTP API will run.');
    }

    const dispatcher = new InterfaceDispatcher(
        adapters,
        {
            normalizer: new Normalizer({
                botName: config.bot.name,
                commandPrefixes: config.bot.commandPrefixes,
                knownBots: config.bot.knownBots,
                filteredWords: config.bot.filteredWords,
            }),
            gateway,
            contextStore,
            stats,
            reactions: config.bot.reactionsEnabled ? new ReactionPicker() : undefined,
        },
        {
            maxQueueSize: config.pipeline.maxQueueSize,
            maxConcurrentWorkers: config.pipeline.maxConcurrentWorkers,
            operationTimeoutMs: config.pipeline.operationTimeoutMs,
            deliveryMaxAttempts: config.pipeline.deliveryMaxAttempts,
        },
    );

    // ── Maintenance ─────────────────────────────────────────────────────────────

    const jobs = new JobScheduler();
    registerMaintenanceJobs(jobs, { contextStore, marketQuotes }, {
        sweepCron: config.context.sweepCron,
        pruneCron: config.market.pruneCron,
    });

    // ── HTTP API ────────────────────────────────────────────────────────────────

    const app = createApiApp({
        health: { scheduler: dispatcher.scheduler, jobs, priceCache, stats, startedAt },
        webhooks: twilio ? [twilio.router] : [],
    });
    const server: Server = await startApiServer(app, config.messaging.twilio.webhookPort);

    await dispatcher.start();
    jobs.startAll();
    console.log(`[Assistant] ${config.bot.name} is up with ${adapters.length} adapter(s).`);
    void logThought(`[Assistant] Started with platforms: ${adapters.flatMap((a) => a.platforms).join(', ') || 'none'}.`);

    // ── Signal Handlers ─────────────────────────────────────────────────────────

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        jobs.stopAll();
        await dispatcher.shutdown();
        await new Promise<void>((resolve) => server.close(() => resolve()));
        db.close();
        await logThought(`[Assistant] Received ${signal}; services stopped.`);
        process.exit(0);
    };

    process.on('SIGINT', () => {
        void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM');
    });
}

main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Assistant] Startup failed: ${message}`);
    process.exit(1);
});
