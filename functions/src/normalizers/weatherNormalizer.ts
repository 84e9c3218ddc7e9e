import * as SunCalc from 'suncalc';
import type { WeatherStemStation } from '../connectors/weatherStemConnector';
import type { Coordinate } from '../models/location';
import type { WeatherSnapshot } from '../models/weather';
import { MalformedUpstreamDataError } from '../utils/errors';
import { civilDateKey, formatTimestampString } from '../utils/timezone';
import { readInteger, readNumber, readString } from './fields';

const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW',
] as const;

const CAMERA_NAME = 'Cloud Camera';

export interface WeatherNormalizeContext {
  now: Date;
  timeZone: string;
  /** Where sunrise and sunset are computed for. */
  campus: Coordinate;
}

type Readings = Map<string, string | number>;

export function normalizeWeatherStation(station: WeatherStemStation, context: WeatherNormalizeContext): WeatherSnapshot {
  const readings = collectReadings(station);
  const temperature = readNumber(readings.get('Thermometer'));
  if (temperature === null) {
    throw new MalformedUpstreamDataError('WeatherSTEM station reported no Thermometer reading');
  }

  const windSpeed = readNumber(readings.get('Anemometer'));
  const humidity = readNumber(readings.get('Hygrometer'));
  const degrees = readNumber(readings.get('Wind Vane'));
  const { sunrise, sunset } = computeSunTimes(context);

  return {
    temperature: Math.round(temperature),
    feelsLike: determineFeelsLike({
      temperature,
      windChill: readNumber(readings.get('Wind Chill')),
      heatIndex: readNumber(readings.get('Heat Index')),
      windSpeed,
      humidity,
    }),
    humidity: humidity === null ? null : Math.trunc(humidity),
    wind: {
      speed: windSpeed === null ? null : Math.trunc(windSpeed),
      gust: readInteger(readings.get('10 Minute Wind Gust')),
      direction: degrees === null ? null : windDirectionLabel(degrees),
      degrees: degrees === null ? null : Math.trunc(degrees),
    },
    uvIndex: readInteger(readings.get('UV Radiation Sensor')),
    rain: {
      rate: readNumber(readings.get('Rain Rate')),
      total: readNumber(readings.get('Rain Gauge')),
    },
    solarRadiation: readInteger(readings.get('Solar Radiation Sensor')),
    sunrise,
    sunset,
    imageUrl: findCameraImage(station),
    lastUpdated: formatTimestampString(context.now, context.timeZone),
  };
}

interface FeelsLikeInputs {
  temperature: number;
  windChill: number | null;
  heatIndex: number | null;
  windSpeed: number | null;
  humidity: number | null;
}

/** NWS: wind chill at or below 50°F with wind over 3 mph, heat index at or above 80°F with humidity over 40%. */
export function determineFeelsLike(inputs: FeelsLikeInputs): number {
  const { temperature, windChill, heatIndex, windSpeed, humidity } = inputs;
  if (temperature <= 50 && windSpeed !== null && windSpeed > 3) {
    return Math.round(windChill ?? temperature);
  }
  if (temperature >= 80 && humidity !== null && humidity > 40) {
    return Math.round(heatIndex ?? temperature);
  }
  return Math.round(temperature);
}

export function windDirectionLabel(degrees: number): string {
  const index = ((Math.round(degrees / 22.5) % 16) + 16) % 16;
  return COMPASS_POINTS[index] ?? 'N';
}

function collectReadings(station: WeatherStemStation): Readings {
  const readings: Readings = new Map();
  const entries = Array.isArray(station.record?.readings) ? station.record?.readings ?? [] : [];
  for (const reading of entries) {
    const sensorType = readString(reading?.sensor_type);
    const value = reading?.value;
    if (sensorType && value !== null && value !== undefined) {
      readings.set(sensorType, value);
    }
  }
  return readings;
}

function findCameraImage(station: WeatherStemStation): string | null {
  const cameras = Array.isArray(station.station?.cameras) ? station.station?.cameras ?? [] : [];
  const camera = cameras.find(candidate => candidate?.name === CAMERA_NAME);
  return readString(camera?.image);
}

function computeSunTimes(context: WeatherNormalizeContext): { sunrise: number | null; sunset: number | null } {
  const [year, month, day] = civilDateKey(context.now, context.timeZone)
    .split('-')
    .map(part => Number.parseInt(part, 10));
  const dayAnchor = new Date(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1, 12));
  const times = SunCalc.getTimes(dayAnchor, context.campus.lat, context.campus.lng);

  return {
    sunrise: toUnixSeconds(times.sunrise),
    sunset: toUnixSeconds(times.sunset),
  };
}

function toUnixSeconds(date: Date): number | null {
  const millis = date.getTime();
  return Number.isNaN(millis) ? null : Math.floor(millis / 1000);
}
