const PART_OPTIONS: Intl.DateTimeFormatOptions = {
  timeZone: 'UTC',
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hourCycle: 'h23',
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

interface CivilParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

function buildFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }
  const formatter = new Intl.DateTimeFormat('en-US', {
    ...PART_OPTIONS,
    timeZone,
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
}

function getCivilParts(date: Date, timeZone: string): CivilParts {
  const parts = buildFormatter(timeZone).formatToParts(date);
  const lookup = Object.fromEntries(parts.map(part => [part.type, part.value]));

  return {
    year: lookup.year ?? '0000',
    month: lookup.month ?? '01',
    day: lookup.day ?? '01',
    hour: lookup.hour === '24' ? '00' : lookup.hour ?? '00',
    minute: lookup.minute ?? '00',
    second: lookup.second ?? '00',
  };
}

export function getTimeZoneOffsetMinutes(date: Date, timeZone: string): number {
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  const parts = getCivilParts(new Date(wholeSeconds), timeZone);

  const localUtcTimestamp = Date.UTC(
    Number(parts.year),
    Number(parts.month) - 1,
    Number(parts.day),
    Number(parts.hour),
    Number(parts.minute),
    Number(parts.second),
  );

  return Math.round((localUtcTimestamp - wholeSeconds) / 60_000);
}

function formatOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

/**
 * Renders an instant as an ISO-8601 timestamp in the given zone, with the
 * zone's UTC offset at that instant, e.g. `2026-02-18T18:30:00-05:00`.
 */
export function toZonedIsoString(date: Date, timeZone: string): string {
  const parts = getCivilParts(date, timeZone);
  const offset = formatOffset(getTimeZoneOffsetMinutes(date, timeZone));
  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}:${parts.minute}:${parts.second}${offset}`;
}

/**
 * Renders the `lastUpdated` marker the mobile clients display:
 * `yyyy-MM-dd hh:mm:ss a` in the given zone.
 */
export function formatTimestampString(date: Date, timeZone: string): string {
  const parts = getCivilParts(date, timeZone);
  const hour24 = Number(parts.hour);
  const meridiem = hour24 < 12 ? 'AM' : 'PM';
  const hour12 = hour24 % 12 === 0 ? 12 : hour24 % 12;
  return `${parts.year}-${parts.month}-${parts.day} ${String(hour12).padStart(2, '0')}:${parts.minute}:${parts.second} ${meridiem}`;
}

export function civilDateKey(date: Date, timeZone: string): string {
  const parts = getCivilParts(date, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

export function addCivilDays(dateKey: string, days: number): string {
  const [year, month, day] = dateKey.split('-').map(part => Number.parseInt(part, 10));
  const shifted = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, (day ?? 1) + days));
  return shifted.toISOString().slice(0, 10);
}

/**
 * Parses a provider timestamp. Values without an offset are read as UTC.
 * Returns null for empty or unparseable input.
 */
export function parseProviderTimestamp(value: string | null | undefined): Date | null {
  if (!value || typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const normalized = trimmed.includes('T') ? trimmed : trimmed.replace(' ', 'T');
  const hasZone = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(normalized);
  const isDateOnly = /^\d{4}-\d{2}-\d{2}$/.test(normalized);
  const candidate = hasZone || isDateOnly ? normalized : `${normalized}Z`;
  const date = new Date(candidate);
  if (Number.isNaN(date.getTime())) {
    return null;
  }
  return date;
}

/**
 * Re-renders a provider timestamp in the civil zone, or null when absent
 * or unparseable.
 */
export function toCivilIso(value: string | null | undefined, timeZone: string): string | null {
  const parsed = parseProviderTimestamp(value);
  return parsed ? toZonedIsoString(parsed, timeZone) : null;
}
