import { loadStopWords, loadTopicLexicon } from '../config/data-tables.js';

export const MAX_KEYWORDS_PER_TURN = 8;
const MIN_TOKEN_LENGTH = 3;

interface CompiledTopic {
  topic: string;
  patterns: RegExp[];
}

let stopWords: Set<string> | null = null;
let compiledLexicon: CompiledTopic[] | null = null;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function getStopWords(): Set<string> {
  stopWords ??= loadStopWords();
  return stopWords;
}

function getLexicon(): CompiledTopic[] {
  compiledLexicon ??= Object.entries(loadTopicLexicon()).map(([topic, triggers]) => ({
    topic,
    patterns: triggers.map((trigger) => new RegExp(`\\b${escapeRegExp(trigger.toLowerCase())}\\b`)),
  }));
  return compiledLexicon;
}

/**
 * Keywords for topic tracking: lexicon categories first (`django` counts as
 * `python`), then plain tokens that are alphabetic, at least three letters
 * long and not stop words. Duplicates are dropped and the list is capped.
 */
export function extractKeywords(text: string, limit: number = MAX_KEYWORDS_PER_TURN): string[] {
  const lower = text.toLowerCase();
  const keywords: string[] = [];
  const add = (keyword: string): void => {
    if (keywords.length < limit && !keywords.includes(keyword)) {
      keywords.push(keyword);
    }
  };

  for (const { topic, patterns } of getLexicon()) {
    if (patterns.some((pattern) => pattern.test(lower))) add(topic);
  }

  const stop = getStopWords();
  for (const token of lower.match(/[a-z]+/g) ?? []) {
    if (token.length < MIN_TOKEN_LENGTH || stop.has(token)) continue;
    add(token);
  }

  return keywords;
}
