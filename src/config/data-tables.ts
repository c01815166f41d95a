import { readFileSync } from 'node:fs';
import type { CurrencyTables } from '../types/market.js';

export interface MemeTemplate {
  id: string;
  name: string;
  boxes: number;
}

const cache = new Map<string, unknown>();

function readDataFile(fileName: string): unknown {
  const cached = cache.get(fileName);
  if (cached !== undefined) return cached;

  // `data/` sits beside `src/` and `dist/`, so the same relative hop works for both.
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, 'utf8'));
  cache.set(fileName, parsed);
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringRecord(value: unknown, label: string): Record<string, string> {
  if (!isRecord(value)) throw new Error(`[DataTables] ${label} must be an object.`);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') out[key] = entry;
  }
  return out;
}

function toStringArray(value: unknown, label: string): string[] {
  if (!Array.isArray(value)) throw new Error(`[DataTables] ${label} must be an array.`);
  return value.filter((entry): entry is string => typeof entry === 'string');
}

export function loadCurrencyTables(): CurrencyTables {
  const raw = readDataFile('currencies.json');
  if (!isRecord(raw)) throw new Error('[DataTables] currencies.json must be an object.');
  return {
    fiatSymbols: toStringRecord(raw.fiatSymbols, 'fiatSymbols'),
    prefixSymbolCurrencies: toStringArray(raw.prefixSymbolCurrencies, 'prefixSymbolCurrencies'),
    commonFiat: toStringArray(raw.commonFiat, 'commonFiat'),
    fiatNames: toStringRecord(raw.fiatNames, 'fiatNames'),
    cryptoIds: toStringRecord(raw.cryptoIds, 'cryptoIds'),
    cryptoNames: toStringRecord(raw.cryptoNames, 'cryptoNames'),
  };
}

export function loadStopWords(): Set<string> {
  return new Set(toStringArray(readDataFile('stopwords.json'), 'stopwords'));
}

/** Topic category → trigger keywords. */
export function loadTopicLexicon(): Record<string, string[]> {
  const raw = readDataFile('topic-lexicon.json');
  if (!isRecord(raw)) throw new Error('[DataTables] topic-lexicon.json must be an object.');
  const lexicon: Record<string, string[]> = {};
  for (const [topic, keywords] of Object.entries(raw)) {
    lexicon[topic] = toStringArray(keywords, `topic-lexicon.${topic}`);
  }
  return lexicon;
}

export function loadMemeTemplates(): Record<string, MemeTemplate> {
  const raw = readDataFile('meme-templates.json');
  if (!isRecord(raw)) throw new Error('[DataTables] meme-templates.json must be an object.');
  const templates: Record<string, MemeTemplate> = {};
  for (const [key, entry] of Object.entries(raw)) {
    if (!isRecord(entry)) continue;
    const { id, name, boxes } = entry;
    if (typeof id === 'string' && typeof name === 'string' && typeof boxes === 'number') {
      templates[key] = { id, name, boxes };
    }
  }
  return templates;
}

export interface TimezoneTable {
  /** Lower-case city → IANA zone. */
  cities: Record<string, string>;
  countries: Record<string, string>;
  /** Zone abbreviations people type (pst, cet) → a zone that observes them. */
  abbreviations: Record<string, string>;
}

export function loadTimezoneTable(): TimezoneTable {
  const raw = readDataFile('timezones.json');
  if (!isRecord(raw)) throw new Error('[DataTables] timezones.json must be an object.');
  return {
    cities: toStringRecord(raw.cities, 'cities'),
    countries: toStringRecord(raw.countries, 'countries'),
    abbreviations: toStringRecord(raw.abbreviations, 'abbreviations'),
  };
}

export interface ReactionTrigger {
  phrase: string;
  emojis: string[];
  /** Probability of reacting when the phrase appears. */
  chance: number;
}

export function loadReactionTriggers(): ReactionTrigger[] {
  const raw = readDataFile('reactions.json');
  if (!isRecord(raw)) throw new Error('[DataTables] reactions.json must be an object.');
  const defaultChance = typeof raw.defaultChance === 'number' ? raw.defaultChance : 0;
  if (!Array.isArray(raw.triggers)) throw new Error('[DataTables] reactions.triggers must be an array.');

  const triggers: ReactionTrigger[] = [];
  for (const entry of raw.triggers) {
    if (!isRecord(entry) || typeof entry.phrase !== 'string') continue;
    const emojis = toStringArray(entry.emojis, `reactions.${entry.phrase}`);
    if (emojis.length === 0) continue;
    triggers.push({
      phrase: entry.phrase.toLowerCase(),
      emojis,
      chance: typeof entry.chance === 'number' ? entry.chance : defaultChance,
    });
  }
  return triggers;
}
