import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const nonEmpty = z.string().trim().min(1);

const RuntimeConfigSchema = z.object({
  CAMPUS_TIME_ZONE: nonEmpty.default('America/New_York').refine(isValidTimeZone, {
    message: 'CAMPUS_TIME_ZONE must be an IANA time zone name',
  }),
  CAMPUS_LATITUDE: z.coerce.number().min(-90).max(90).default(35.7717255492),
  CAMPUS_LONGITUDE: z.coerce.number().min(-180).max(180).default(-78.6736536026),
  FIREBASE_DATABASE_URL: z.string().url().optional(),
  WEATHERSTEM_URL: z.string().url().default('https://api.weatherstem.com/api'),
  WEATHERSTEM_API_KEY: nonEmpty.optional(),
  WEATHERSTEM_STATION: nonEmpty.default('ncstate@wake.weatherstem.com'),
  OPENSPACE_URL: z.string().url().default('https://api.streetsoncloud.com/pl2/multi-lot-info'),
  OPENSPACE_API_KEY: nonEmpty.optional(),
  WAITZ_URL: z.string().url().default('https://waitz.io/live/ncsu'),
  LOCALIST_URL: z.string().url().default('https://calendar.ncsu.edu/api/2/events'),
  ENGAGE_URL: z.string().url().default('https://engage-api.campuslabs.com/api/v3.0'),
  ENGAGE_API_KEY: nonEmpty.optional(),
  ALERT_FEED_URL: z.string().url().optional(),
  ALERT_TOPIC: nonEmpty.default('emergencyAlerts'),
});

export interface RuntimeConfig {
  timeZone: string;
  campus: { lat: number; lng: number };
  databaseUrl?: string;
  weatherStem: { url: string; apiKey?: string; station: string };
  openSpace: { url: string; apiKey?: string };
  waitz: { url: string };
  localist: { url: string };
  engage: { url: string; apiKey?: string };
  alerts: { feedUrl?: string; topic: string };
}

let cached: RuntimeConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid runtime configuration', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const values = parsed.data;
  return {
    timeZone: values.CAMPUS_TIME_ZONE,
    campus: { lat: values.CAMPUS_LATITUDE, lng: values.CAMPUS_LONGITUDE },
    databaseUrl: values.FIREBASE_DATABASE_URL,
    weatherStem: {
      url: values.WEATHERSTEM_URL,
      apiKey: values.WEATHERSTEM_API_KEY,
      station: values.WEATHERSTEM_STATION,
    },
    openSpace: { url: values.OPENSPACE_URL, apiKey: values.OPENSPACE_API_KEY },
    waitz: { url: values.WAITZ_URL },
    localist: { url: values.LOCALIST_URL },
    engage: { url: values.ENGAGE_URL, apiKey: values.ENGAGE_API_KEY },
    alerts: { feedUrl: values.ALERT_FEED_URL, topic: values.ALERT_TOPIC },
  };
}

/** Parsed once per function instance. */
export function getConfig(): RuntimeConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`${name} is not configured`);
  }
  return value;
}

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}
