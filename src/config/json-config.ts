import * as fs from 'fs/promises';
import * as path from 'path';

export type LlmProvider = 'openrouter' | 'ollama';
export type ContextBackendKind = 'memory' | 'sqlite';

export interface AssistantConfig {
    bot: {
        name: string;
        commandPrefixes: string[];
        knownBots: string[];
        filteredWords: string[];
        personality: string;
        reactionsEnabled: boolean;
    };
    pipeline: {
        maxQueueSize: number;
        maxConcurrentWorkers: number;
        llmTimeoutSeconds: number;
        operationTimeoutMs: number;
        deliveryMaxAttempts: number;
    };
    context: {
        historyLimit: number;
        topicDecay: number;
        topTopics: number;
        idleTtlSeconds: number;
        sweepCron: string;
        backend: ContextBackendKind;
    };
    market: {
        priceCacheTtlSeconds: number;
        fetchTimeoutSeconds: number;
        serveStaleOnError: boolean;
        maxStaleSeconds: number;
        pruneCron: string;
    };
    llm: {
        provider: LlmProvider;
        openRouterApiKey: string;
        openRouterUrl: string;
        model: string;
        fallbackModel: string;
        ollamaUrl: string;
        ollamaModel: string;
        temperature: number;
        maxTokens: number;
    };
    search: {
        enabled: boolean;
        jinaApiKey: string;
        timeoutSeconds: number;
    };
    meme: {
        enabled: boolean;
        imgflipUsername: string;
        imgflipPassword: string;
    };
    messaging: {
        telegram: {
            enabled: boolean;
            botToken: string;
            allowedChats: string[];
        };
        discord: {
            enabled: boolean;
            botToken: string;
            allowedGuilds: string[];
        };
        twilio: {
            enabled: boolean;
            accountSid: string;
            authToken: string;
            whatsappNumber: string;
            messengerPageId: string;
            instagramAccountId: string;
            webhookPort: number;
        };
    };
    storage: {
        databasePath: string;
    };
}

export const DEFAULT_CONFIG: AssistantConfig = {
    bot: {
        name: 'roomwise',
        commandPrefixes: ['?', '!', '/'],
        knownBots: [],
        filteredWords: [],
        personality:
            'You are Roomwise, a laid-back, knowledgeable chat buddy hanging out in group chats. ' +
            'Keep answers short and conversational, use the room context when it helps, and admit when you do not know.',
        reactionsEnabled: true,
    },
    pipeline: {
        maxQueueSize: 5,
        maxConcurrentWorkers: 4,
        llmTimeoutSeconds: 30,
        operationTimeoutMs: 2_000,
        deliveryMaxAttempts: 3,
    },
    context: {
        historyLimit: 20,
        topicDecay: 0.95,
        topTopics: 5,
        idleTtlSeconds: 86_400,
        sweepCron: '0 * * * *',
        backend: 'memory',
    },
    market: {
        priceCacheTtlSeconds: 300,
        fetchTimeoutSeconds: 5,
        serveStaleOnError: false,
        maxStaleSeconds: 900,
        pruneCron: '*/10 * * * *',
    },
    llm: {
        provider: 'openrouter',
        openRouterApiKey: '',
        openRouterUrl: 'https://openrouter.ai/api/v1/chat/completions',
        model: 'deepseek/deepseek-chat-v3-0324:free',
        fallbackModel: '',
        ollamaUrl: 'http://localhost:11434',
        ollamaModel: 'llama3',
        temperature: 0.8,
        maxTokens: 1000,
    },
    search: {
        enabled: false,
        jinaApiKey: '',
        timeoutSeconds: 10,
    },
    meme: {
        enabled: true,
        imgflipUsername: '',
        imgflipPassword: '',
    },
    messaging: {
        telegram: {
            enabled: false,
            botToken: '',
            allowedChats: [],
        },
        discord: {
            enabled: false,
            botToken: '',
            allowedGuilds: [],
        },
        twilio: {
            enabled: false,
            accountSid: '',
            authToken: '',
            whatsappNumber: '',
            messengerPageId: '',
            instagramAccountId: '',
            webhookPort: 5000,
        },
    },
    storage: {
        databasePath: 'memory/roomwise.db',
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.ASSISTANT_CONFIG_PATH) {
        return path.resolve(process.env.ASSISTANT_CONFIG_PATH);
    }
    return path.resolve('assistant.json');
}

export async function readConfig(overridePath?: string): Promise<AssistantConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to read config file at ${targetPath}: ${message}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

/** Config file merged over defaults, then environment overrides on top. */
export async function loadConfig(
    overridePath?: string,
    env: NodeJS.ProcessEnv = process.env,
): Promise<AssistantConfig> {
    return applyEnvOverrides(await readConfig(overridePath), env);
}

// ── Merging ──────────────────────────────────────────────────────────────────

type UnknownRecord = Record<string, unknown>;

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: UnknownRecord, key: string): UnknownRecord {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function str(source: UnknownRecord, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function num(source: UnknownRecord, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

/** Positive numbers only, as the matching environment overrides require. */
function pos(source: UnknownRecord, key: string, fallback: number, integer = true): number {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        console.warn(`[Config] Ignoring ${key} in config file: expected a positive number, got '${String(value)}'.`);
        return fallback;
    }
    return integer ? Math.floor(value) : value;
}

function factor(source: UnknownRecord, key: string, fallback: number): number {
    const value = source[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || value > 1) {
        console.warn(`[Config] Ignoring ${key} in config file: expected a factor in (0, 1], got '${String(value)}'.`);
        return fallback;
    }
    return value;
}

function bool(source: UnknownRecord, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function list(source: UnknownRecord, key: string, fallback: string[]): string[] {
    const value = source[key];
    if (!Array.isArray(value)) return [...fallback];
    return value
        .filter((entry): entry is string | number => typeof entry === 'string' || typeof entry === 'number')
        .map((entry) => String(entry));
}

function oneOf<T extends string>(source: UnknownRecord, key: string, allowed: readonly T[], fallback: T): T {
    const value = source[key];
    return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function mergeWithDefaults(loaded: unknown): AssistantConfig {
    const root = isRecord(loaded) ? loaded : {};
    const d = DEFAULT_CONFIG;

    const bot = section(root, 'bot');
    const pipeline = section(root, 'pipeline');
    const context = section(root, 'context');
    const market = section(root, 'market');
    const llm = section(root, 'llm');
    const search = section(root, 'search');
    const meme = section(root, 'meme');
    const messaging = section(root, 'messaging');
    const telegram = section(messaging, 'telegram');
    const discord = section(messaging, 'discord');
    const twilio = section(messaging, 'twilio');
    const storage = section(root, 'storage');

    return {
        bot: {
            name: str(bot, 'name', d.bot.name),
            commandPrefixes: list(bot, 'commandPrefixes', d.bot.commandPrefixes),
            knownBots: list(bot, 'knownBots', d.bot.knownBots),
            filteredWords: list(bot, 'filteredWords', d.bot.filteredWords),
            personality: str(bot, 'personality', d.bot.personality),
            reactionsEnabled: bool(bot, 'reactionsEnabled', d.bot.reactionsEnabled),
        },
        pipeline: {
            maxQueueSize: pos(pipeline, 'maxQueueSize', d.pipeline.maxQueueSize),
            maxConcurrentWorkers: pos(pipeline, 'maxConcurrentWorkers', d.pipeline.maxConcurrentWorkers),
            llmTimeoutSeconds: pos(pipeline, 'llmTimeoutSeconds', d.pipeline.llmTimeoutSeconds, false),
            operationTimeoutMs: pos(pipeline, 'operationTimeoutMs', d.pipeline.operationTimeoutMs),
            deliveryMaxAttempts: pos(pipeline, 'deliveryMaxAttempts', d.pipeline.deliveryMaxAttempts),
        },
        context: {
            historyLimit: pos(context, 'historyLimit', d.context.historyLimit),
            topicDecay: factor(context, 'topicDecay', d.context.topicDecay),
            topTopics: pos(context, 'topTopics', d.context.topTopics),
            idleTtlSeconds: pos(context, 'idleTtlSeconds', d.context.idleTtlSeconds),
            sweepCron: str(context, 'sweepCron', d.context.sweepCron),
            backend: oneOf(context, 'backend', ['memory', 'sqlite'], d.context.backend),
        },
        market: {
            priceCacheTtlSeconds: pos(market, 'priceCacheTtlSeconds', d.market.priceCacheTtlSeconds),
            fetchTimeoutSeconds: pos(market, 'fetchTimeoutSeconds', d.market.fetchTimeoutSeconds, false),
            serveStaleOnError: bool(market, 'serveStaleOnError', d.market.serveStaleOnError),
            maxStaleSeconds: pos(market, 'maxStaleSeconds', d.market.maxStaleSeconds),
            pruneCron: str(market, 'pruneCron', d.market.pruneCron),
        },
        llm: {
            provider: oneOf(llm, 'provider', ['openrouter', 'ollama'], d.llm.provider),
            openRouterApiKey: str(llm, 'openRouterApiKey', d.llm.openRouterApiKey),
            openRouterUrl: str(llm, 'openRouterUrl', d.llm.openRouterUrl),
            model: str(llm, 'model', d.llm.model),
            fallbackModel: str(llm, 'fallbackModel', d.llm.fallbackModel),
            ollamaUrl: str(llm, 'ollamaUrl', d.llm.ollamaUrl),
            ollamaModel: str(llm, 'ollamaModel', d.llm.ollamaModel),
            temperature: num(llm, 'temperature', d.llm.temperature),
            maxTokens: pos(llm, 'maxTokens', d.llm.maxTokens),
        },
        search: {
            enabled: bool(search, 'enabled', d.search.enabled),
            jinaApiKey: str(search, 'jinaApiKey', d.search.jinaApiKey),
            timeoutSeconds: pos(search, 'timeoutSeconds', d.search.timeoutSeconds, false),
        },
        meme: {
            enabled: bool(meme, 'enabled', d.meme.enabled),
            imgflipUsername: str(meme, 'imgflipUsername', d.meme.imgflipUsername),
            imgflipPassword: str(meme, 'imgflipPassword', d.meme.imgflipPassword),
        },
        messaging: {
            telegram: {
                enabled: bool(telegram, 'enabled', d.messaging.telegram.enabled),
                botToken: str(telegram, 'botToken', d.messaging.telegram.botToken),
                allowedChats: list(telegram, 'allowedChats', d.messaging.telegram.allowedChats),
            },
            discord: {
                enabled: bool(discord, 'enabled', d.messaging.discord.enabled),
                botToken: str(discord, 'botToken', d.messaging.discord.botToken),
                allowedGuilds: list(discord, 'allowedGuilds', d.messaging.discord.allowedGuilds),
            },
            twilio: {
                enabled: bool(twilio, 'enabled', d.messaging.twilio.enabled),
                accountSid: str(twilio, 'accountSid', d.messaging.twilio.accountSid),
                authToken: str(twilio, 'authToken', d.messaging.twilio.authToken),
                whatsappNumber: str(twilio, 'whatsappNumber', d.messaging.twilio.whatsappNumber),
                messengerPageId: str(twilio, 'messengerPageId', d.messaging.twilio.messengerPageId),
                instagramAccountId: str(twilio, 'instagramAccountId', d.messaging.twilio.instagramAccountId),
                webhookPort: pos(twilio, 'webhookPort', d.messaging.twilio.webhookPort),
            },
        },
        storage: {
            databasePath: str(storage, 'databasePath', d.storage.databasePath),
        },
    };
}

// ── Environment overrides ────────────────────────────────────────────────────

type EnvSetter = (config: AssistantConfig, raw: string) => void;

function splitList(raw: string): string[] {
    return raw
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

function parseFlag(raw: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/** Returns null for anything that is not a finite number above zero. */
function parsePositive(raw: string): number | null {
    const value = Number(raw);
    return Number.isFinite(value) && value > 0 ? value : null;
}

function positive(apply: (config: AssistantConfig, value: number) => void, integer = true): EnvSetter {
    return (config, raw) => {
        const value = parsePositive(raw);
        if (value === null) {
            throw new Error(`expected a positive number, got '${raw}'`);
        }
        apply(config, integer ? Math.floor(value) : value);
    };
}

const ENV_OVERRIDES: Record<string, EnvSetter> = {
    BOT_USERNAME: (c, v) => { c.bot.name = v.trim().toLowerCase(); },
    COMMAND_PREFIXES: (c, v) => { c.bot.commandPrefixes = splitList(v); },
    KNOWN_BOTS: (c, v) => { c.bot.knownBots = splitList(v); },
    FILTERED_WORDS: (c, v) => { c.bot.filteredWords = splitList(v); },
    ENABLE_REACTIONS: (c, v) => { c.bot.reactionsEnabled = parseFlag(v); },

    MAX_QUEUE_SIZE: positive((c, n) => { c.pipeline.maxQueueSize = n; }),
    MAX_CONCURRENT_WORKERS: positive((c, n) => { c.pipeline.maxConcurrentWorkers = n; }),
    LLM_TIMEOUT: positive((c, n) => { c.pipeline.llmTimeoutSeconds = n; }, false),
    OPERATION_TIMEOUT_MS: positive((c, n) => { c.pipeline.operationTimeoutMs = n; }),

    MAX_ROOM_HISTORY: positive((c, n) => { c.context.historyLimit = n; }),
    TOPIC_DECAY: (c, v) => {
        const value = Number(v);
        if (!Number.isFinite(value) || value <= 0 || value > 1) {
            throw new Error(`expected a factor in (0, 1], got '${v}'`);
        }
        c.context.topicDecay = value;
    },
    CONTEXT_CLEANUP_AGE: positive((c, n) => { c.context.idleTtlSeconds = n; }),
    CONTEXT_BACKEND: (c, v) => {
        const value = v.trim().toLowerCase();
        if (value !== 'memory' && value !== 'sqlite') {
            throw new Error(`expected 'memory' or 'sqlite', got '${v}'`);
        }
        c.context.backend = value;
    },

    PRICE_CACHE_TTL: positive((c, n) => { c.market.priceCacheTtlSeconds = n; }),
    PRICE_FETCH_TIMEOUT: positive((c, n) => { c.market.fetchTimeoutSeconds = n; }, false),
    PRICE_SERVE_STALE_ON_ERROR: (c, v) => { c.market.serveStaleOnError = parseFlag(v); },

    LLM_PROVIDER: (c, v) => {
        const value = v.trim().toLowerCase();
        if (value !== 'openrouter' && value !== 'ollama') {
            throw new Error(`expected 'openrouter' or 'ollama', got '${v}'`);
        }
        c.llm.provider = value;
    },
    OPENROUTER_API_KEY: (c, v) => { c.llm.openRouterApiKey = v; },
    OPENROUTER_URL: (c, v) => { c.llm.openRouterUrl = v; },
    OPENROUTER_MODEL: (c, v) => { c.llm.model = v; },
    OPENROUTER_FALLBACK_MODEL: (c, v) => { c.llm.fallbackModel = v; },
    OLLAMA_URL: (c, v) => { c.llm.ollamaUrl = v; },
    OLLAMA_MODEL: (c, v) => { c.llm.ollamaModel = v; },

    ENABLE_WEB_SEARCH: (c, v) => { c.search.enabled = parseFlag(v); },
    JINA_API_KEY: (c, v) => { c.search.jinaApiKey = v; },
    SEARCH_TIMEOUT: positive((c, n) => { c.search.timeoutSeconds = n; }, false),

    ENABLE_MEME_GENERATION: (c, v) => { c.meme.enabled = parseFlag(v); },
    IMGFLIP_USERNAME: (c, v) => { c.meme.imgflipUsername = v; },
    IMGFLIP_PASSWORD: (c, v) => { c.meme.imgflipPassword = v; },

    ENABLE_TELEGRAM: (c, v) => { c.messaging.telegram.enabled = parseFlag(v); },
    TELEGRAM_BOT_TOKEN: (c, v) => { c.messaging.telegram.botToken = v; },
    TELEGRAM_ALLOWED_CHATS: (c, v) => { c.messaging.telegram.allowedChats = splitList(v); },
    ENABLE_DISCORD: (c, v) => { c.messaging.discord.enabled = parseFlag(v); },
    DISCORD_TOKEN: (c, v) => { c.messaging.discord.botToken = v; },
    DISCORD_ALLOWED_GUILDS: (c, v) => { c.messaging.discord.allowedGuilds = splitList(v); },
    ENABLE_TWILIO: (c, v) => { c.messaging.twilio.enabled = parseFlag(v); },
    TWILIO_ACCOUNT_SID: (c, v) => { c.messaging.twilio.accountSid = v; },
    TWILIO_AUTH_TOKEN: (c, v) => { c.messaging.twilio.authToken = v; },
    TWILIO_WHATSAPP_NUMBER: (c, v) => { c.messaging.twilio.whatsappNumber = v; },
    TWILIO_MESSENGER_PAGE_ID: (c, v) => { c.messaging.twilio.messengerPageId = v; },
    TWILIO_INSTAGRAM_ACCOUNT_ID: (c, v) => { c.messaging.twilio.instagramAccountId = v; },
    TWILIO_WEBHOOK_PORT: positive((c, n) => { c.messaging.twilio.webhookPort = n; }),

    DATABASE_PATH: (c, v) => { c.storage.databasePath = v; },
};

/**
 * Apply recognized environment variables on top of a merged config. Invalid
 * values are reported and leave the file/default value in place.
 */
export function applyEnvOverrides(config: AssistantConfig, env: NodeJS.ProcessEnv): AssistantConfig {
    const next = structuredClone(config);
    for (const [key, apply] of Object.entries(ENV_OVERRIDES)) {
        const raw = env[key];
        if (raw === undefined || raw.trim() === '') continue;
        try {
            apply(next, raw);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Config] Ignoring ${key}: ${message}.`);
        }
    }
    return next;
}

export function listEnvOverrideKeys(): string[] {
    return Object.keys(ENV_OVERRIDES);
}
