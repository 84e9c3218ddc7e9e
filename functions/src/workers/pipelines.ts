import { getConfig, requireSetting, type RuntimeConfig } from '../config/runtimeConfig';
import { AlertFeedConnector } from '../connectors/alertFeedConnector';
import { EngageConnector } from '../connectors/engageConnector';
import { LocalistConnector } from '../connectors/localistConnector';
import { OpenSpaceConnector } from '../connectors/openSpaceConnector';
import { WaitzConnector } from '../connectors/waitzConnector';
import { WeatherStemConnector } from '../connectors/weatherStemConnector';
import { AlertStateStore } from '../services/alertStateStore';
import {
  EventCollectionStore,
  isCalendarEventRecord,
  isOrganizationEventRecord,
} from '../services/eventCollectionStore';
import { FirestoreDocumentStore } from '../services/firestoreDocumentStore';
import { FcmNotificationSender } from '../services/notifier';
import { RealtimeOverwriteStore } from '../services/realtimeStore';
import { AlertDedup } from '../sync/alertDedup';
import { syncEmergencyAlerts } from './emergencyAlertSync';
import {
  CALENDAR_HORIZON_DAYS,
  ORGANIZATION_HORIZON_DAYS,
  syncCalendarEvents,
  syncOrganizationEvents,
} from './eventCollectionSync';
import type { CampusDomain, Pipeline } from './invocation';
import { syncBusyness, syncParking, syncWeather } from './snapshotSync';

export type PipelineRegistry = Record<CampusDomain, Pipeline>;

/**
 * Production wiring for every domain. Configuration and clients are
 * resolved when a pipeline runs, so a missing secret fails that run (and
 * is contained with it) rather than the module load.
 */
export function buildPipelines(config: () => RuntimeConfig = getConfig): PipelineRegistry {
  return {
    weather: () => {
      const { timeZone, campus, weatherStem } = config();
      return syncWeather({
        connector: new WeatherStemConnector({
          url: weatherStem.url,
          apiKey: requireSetting(weatherStem.apiKey, 'WEATHERSTEM_API_KEY'),
          station: weatherStem.station,
        }),
        store: new RealtimeOverwriteStore(),
        timeZone,
        campus,
      });
    },

    parking: () => {
      const { timeZone, openSpace } = config();
      return syncParking({
        connector: new OpenSpaceConnector({
          url: openSpace.url,
          apiKey: requireSetting(openSpace.apiKey, 'OPENSPACE_API_KEY'),
        }),
        store: new RealtimeOverwriteStore(),
        timeZone,
      });
    },

    busyness: () => {
      const { timeZone, waitz } = config();
      return syncBusyness({
        connector: new WaitzConnector({ url: waitz.url }),
        store: new RealtimeOverwriteStore(),
        timeZone,
      });
    },

    calendarEvents: () => {
      const { timeZone, localist } = config();
      return syncCalendarEvents({
        connector: new LocalistConnector({ baseUrl: localist.url, days: CALENDAR_HORIZON_DAYS }),
        store: new EventCollectionStore(new FirestoreDocumentStore(), 'calendarEvents', isCalendarEventRecord),
        timeZone,
        horizonDays: CALENDAR_HORIZON_DAYS,
      });
    },

    organizationEvents: () => {
      const { timeZone, engage } = config();
      return syncOrganizationEvents({
        connector: new EngageConnector({
          baseUrl: engage.url,
          apiKey: requireSetting(engage.apiKey, 'ENGAGE_API_KEY'),
          timeZone,
          horizonDays: ORGANIZATION_HORIZON_DAYS,
        }),
        store: new EventCollectionStore(new FirestoreDocumentStore(), 'organizationEvents', isOrganizationEventRecord),
        timeZone,
        horizonDays: ORGANIZATION_HORIZON_DAYS,
      });
    },

    emergencyAlerts: () => {
      const { timeZone, alerts } = config();
      return syncEmergencyAlerts({
        connector: new AlertFeedConnector({ feedUrl: requireSetting(alerts.feedUrl, 'ALERT_FEED_URL') }),
        dedup: new AlertDedup({
          state: new AlertStateStore(new RealtimeOverwriteStore()),
          notifier: new FcmNotificationSender(),
          topic: alerts.topic,
        }),
        timeZone,
      });
    },
  };
}
