import type { LocalistEvent, LocalistEventEnvelope, LocalistEventInstance } from '../connectors/localistConnector';
import type { CalendarEventRecord } from '../models/event';
import { MalformedUpstreamDataError } from '../utils/errors';
import { toPlainText } from '../utils/html';
import { toCivilIso } from '../utils/timezone';
import { buildCoordinate, buildLocation, readBoolean, readString } from './fields';

export function normalizeLocalistEvent(envelope: LocalistEventEnvelope, timeZone: string): CalendarEventRecord {
  const raw: LocalistEvent = envelope.event ?? {};
  const providerId = readString(raw.id);
  if (!providerId) {
    throw new MalformedUpstreamDataError('Localist event is missing its id', { title: raw.title ?? null });
  }

  const instance = firstInstance(raw);
  const start = toCivilIso(instance.start, timeZone);
  if (!start) {
    throw new MalformedUpstreamDataError('Localist event has no parseable start time', { id: providerId });
  }

  return {
    id: `localist_${providerId}`,
    title: readString(raw.title) ?? '',
    description: toPlainText(raw.description) ?? readString(raw.description_text),
    start,
    end: toCivilIso(instance.end, timeZone),
    allDay: readBoolean(instance.all_day, false),
    location: buildLocation(
      raw.location_name,
      raw.address,
      buildCoordinate(raw.geo?.latitude, raw.geo?.longitude),
    ),
    url: readString(raw.localist_url) ?? readString(raw.url),
    imageUrl: readString(raw.photo_url),
    source: 'localist',
    categories: collectNames(raw.filters?.event_types),
    department: collectNames(raw.departments)[0] ?? null,
  };
}

function firstInstance(raw: LocalistEvent): LocalistEventInstance {
  const instances = Array.isArray(raw.event_instances) ? raw.event_instances : [];
  return instances[0]?.event_instance ?? {};
}

function collectNames(items: Array<{ name?: string | null }> | null | undefined): string[] {
  if (!Array.isArray(items)) {
    return [];
  }
  const names: string[] = [];
  for (const item of items) {
    const name = readString(item?.name);
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}
