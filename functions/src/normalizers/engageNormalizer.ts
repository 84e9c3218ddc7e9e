import type { EngageEvent } from '../connectors/engageConnector';
import type { OrganizationEventRecord } from '../models/event';
import { MalformedUpstreamDataError } from '../utils/errors';
import { toPlainText } from '../utils/html';
import { toCivilIso } from '../utils/timezone';
import { buildCoordinate, buildLocation, readString, readStringList } from './fields';

export interface EngageNormalizeContext {
  timeZone: string;
  /** Organization id -> name, from the organization lookup. */
  organizations?: Record<string, string>;
}

export function normalizeEngageEvent(raw: EngageEvent, context: EngageNormalizeContext): OrganizationEventRecord {
  const providerId = readString(raw.id);
  if (!providerId) {
    throw new MalformedUpstreamDataError('Engage event is missing its id', { name: raw.name ?? null });
  }

  const start = toCivilIso(raw.startsOn ?? raw.startDateTime, context.timeZone);
  if (!start) {
    throw new MalformedUpstreamDataError('Engage event has no parseable start time', { id: providerId });
  }

  const address = raw.address ?? null;
  const benefits = readStringList(raw.benefits ?? raw.benefitNames);

  return {
    id: `engage_${providerId}`,
    title: readString(raw.name) ?? '',
    description: toPlainText(raw.description),
    start,
    end: toCivilIso(raw.endsOn ?? raw.endDateTime, context.timeZone),
    allDay: false,
    location: address
      ? buildLocation(
          address.name,
          readString(address.address) ?? address.line1,
          buildCoordinate(address.latitude, address.longitude),
        )
      : null,
    url: null,
    imageUrl: readString(raw.imageUrl),
    source: 'engage',
    categories: buildCategories(raw),
    organization: resolveOrganization(raw, context.organizations ?? {}),
    benefits: benefits.length > 0 ? benefits : null,
  };
}

/** The event theme leads, followed by category names in provider order. */
function buildCategories(raw: EngageEvent): string[] {
  const categoryNames = Array.isArray(raw.categories)
    ? raw.categories.map(category => category?.name)
    : raw.categoryNames;

  return readStringList([raw.theme, ...(Array.isArray(categoryNames) ? categoryNames : [])]);
}

function resolveOrganization(raw: EngageEvent, organizations: Record<string, string>): string | null {
  const named = readString(raw.organizationName);
  if (named) {
    return named;
  }
  const organizationId = readString(raw.submittedByOrganizationId);
  return organizationId ? organizations[organizationId] ?? null : null;
}
