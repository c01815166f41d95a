import { loadTimezoneTable, type TimezoneTable } from '../config/data-tables.js';

export interface ClockReading {
  /** The location as the user wrote it, title-cased. */
  label: string;
  timeZone: string;
  /** `09:05 PM` */
  time: string;
  /** `Thursday, January 15, 2026` */
  date: string;
  /** Short zone name as ICU reports it: `EST`, `GMT+9`, `UTC`. */
  zoneName: string;
  /** `+05:30`, `-05:00`, `+00:00` */
  utcOffset: string;
}

export type ClockLookup =
  | { ok: true; reading: ClockReading }
  | { ok: false; location: string; suggestions: string[] };

const MAX_SUGGESTIONS = 5;

function normalize(location: string): string {
  return location.trim().toLowerCase().replace(/\s+/g, ' ');
}

function titleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

/**
 * Local time for cities, countries, zone abbreviations and IANA zone names,
 * formatted with the runtime's ICU data.
 */
export class WorldClock {
  readonly #table: TimezoneTable;
  #ianaZones: Map<string, string> | null = null;

  constructor(table: TimezoneTable = loadTimezoneTable()) {
    this.#table = table;
  }

  /** IANA zone for a location, or null when nothing matches. */
  resolve(location: string): string | null {
    const key = normalize(location);
    if (!key) return null;
    const { cities, countries, abbreviations } = this.#table;
    for (const table of [cities, countries, abbreviations]) {
      if (Object.hasOwn(table, key)) return table[key] ?? null;
    }
    return this.#zones().get(key) ?? null;
  }

  lookup(location: string, at: number): ClockLookup {
    const timeZone = this.resolve(location);
    if (!timeZone) {
      return { ok: false, location: location.trim(), suggestions: this.suggest(location) };
    }
    return { ok: true, reading: this.read(timeZone, titleCase(normalize(location)), at) };
  }

  read(timeZone: string, label: string, at: number): ClockReading {
    const parts = new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'long',
      year: 'numeric',
      month: 'long',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      hour12: true,
    }).formatToParts(at);
    const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((entry) => entry.type === type)?.value ?? '';

    const offset = zonePart(timeZone, 'longOffset', at).replace(/^GMT/, '');
    return {
      label,
      timeZone,
      time: `${part('hour')}:${part('minute')} ${part('dayPeriod')}`,
      date: `${part('weekday')}, ${part('month')} ${part('day')}, ${part('year')}`,
      zoneName: zonePart(timeZone, 'short', at),
      utcOffset: offset || '+00:00',
    };
  }

  /** Known city and country names that contain the query. */
  suggest(query: string): string[] {
    const needle = normalize(query);
    if (needle.length < 2) return [];
    const names = [...Object.keys(this.#table.cities), ...Object.keys(this.#table.countries)];
    return names
      .filter((name) => name.includes(needle))
      .slice(0, MAX_SUGGESTIONS)
      .map(titleCase);
  }

  /** `asia/kathmandu` and `kathmandu` both map to `Asia/Kathmandu`. */
  #zones(): Map<string, string> {
    if (this.#ianaZones) return this.#ianaZones;
    const zones = new Map<string, string>();
    for (const zone of Intl.supportedValuesOf('timeZone')) {
      zones.set(zone.toLowerCase(), zone);
      const city = zone.split('/').pop();
      if (city && zone.includes('/')) {
        const name = city.replace(/_/g, ' ').toLowerCase();
        if (!zones.has(name)) zones.set(name, zone);
      }
    }
    this.#ianaZones = zones;
    return zones;
  }
}

function zonePart(timeZone: string, style: 'short' | 'longOffset', at: number): string {
  return (
    new Intl.DateTimeFormat('en-US', { timeZone, timeZoneName: style })
      .formatToParts(at)
      .find((entry) => entry.type === 'timeZoneName')?.value ?? ''
  );
}
