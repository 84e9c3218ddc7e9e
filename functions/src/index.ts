import * as functions from 'firebase-functions/v1';
import { createTriggerApp } from './api/routes';
import { scheduledHandler, type CampusDomain } from './workers/invocation';
import { buildPipelines } from './workers/pipelines';

const SCHEDULE_TIME_ZONE = 'America/New_York';

interface ScheduleConfig {
  schedule: string;
  timeoutSeconds: number;
  secrets: string[];
}

const DOMAIN_SCHEDULES: Record<CampusDomain, ScheduleConfig> = {
  weather: {
    schedule: 'every 5 minutes',
    timeoutSeconds: 60,
    secrets: ['WEATHERSTEM_API_KEY'],
  },
  parking: {
    schedule: 'every 2 minutes',
    timeoutSeconds: 60,
    secrets: ['OPENSPACE_API_KEY'],
  },
  busyness: {
    schedule: 'every 5 minutes',
    timeoutSeconds: 60,
    secrets: [],
  },
  calendarEvents: {
    schedule: 'every 60 minutes',
    timeoutSeconds: 120,
    secrets: [],
  },
  organizationEvents: {
    schedule: 'every 60 minutes',
    timeoutSeconds: 120,
    secrets: ['ENGAGE_API_KEY'],
  },
  emergencyAlerts: {
    schedule: 'every 1 minutes',
    timeoutSeconds: 60,
    secrets: [],
  },
};

const pipelines = buildPipelines();

function scheduled(domain: CampusDomain) {
  const config = DOMAIN_SCHEDULES[domain];
  return functions
    .runWith({
      timeoutSeconds: config.timeoutSeconds,
      memory: '256MB',
      secrets: config.secrets,
    })
    .pubsub
    .schedule(config.schedule)
    .timeZone(SCHEDULE_TIME_ZONE)
    .onRun(scheduledHandler(domain, pipelines[domain]));
}

export const getWeather = scheduled('weather');
export const getLiveParking = scheduled('parking');
export const getLiveCampusBusyness = scheduled('busyness');
export const getCalendarEvents = scheduled('calendarEvents');
export const getOrganizationEvents = scheduled('organizationEvents');
export const getEmergencyAlerts = scheduled('emergencyAlerts');

export const triggerCampusSync = functions
  .runWith({
    timeoutSeconds: 120,
    memory: '256MB',
    secrets: ['API_KEY', 'WEATHERSTEM_API_KEY', 'OPENSPACE_API_KEY', 'ENGAGE_API_KEY'],
  })
  .https.onRequest(createTriggerApp(pipelines));
