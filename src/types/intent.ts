export type HelpTopic = 'meme' | 'search' | 'price' | 'stock' | 'time';

/** Classified purpose of one inbound message. Closed union; see IntentRouter. */
export type Intent =
  | { kind: 'rejected' }
  | { kind: 'reset' }
  | { kind: 'summary' }
  | { kind: 'help'; topic?: HelpTopic }
  | { kind: 'stats' }
  | { kind: 'url-analysis'; urls: string[]; instruction: string }
  | { kind: 'price'; symbol: string; quoteCurrency: string }
  | { kind: 'fx'; base: string; quote: string; amount: number }
  | { kind: 'stock'; symbol: string }
  /** No locations means UTC. */
  | { kind: 'clock'; locations: string[] }
  | { kind: 'meme'; topic: string }
  | { kind: 'search'; query: string }
  | {
      kind: 'chat';
      text: string;
      /** True when the message mentions a keyword the room has not discussed yet. */
      novelTopic: boolean;
      keywords: string[];
    };

export type IntentKind = Intent['kind'];
