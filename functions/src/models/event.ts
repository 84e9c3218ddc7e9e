import type { Location, TimestampString } from './location';

export type EventSource = 'localist' | 'engage';

interface BaseEventRecord {
  /** `<source>_<providerId>` */
  id: string;
  title: string;
  description: string | null;
  /** ISO-8601 with the campus zone's UTC offset. */
  start: string;
  end: string | null;
  allDay: boolean;
  location: Location | null;
  url: string | null;
  imageUrl: string | null;
  categories: string[];
}

export interface CalendarEventRecord extends BaseEventRecord {
  source: 'localist';
  department: string | null;
}

export interface OrganizationEventRecord extends BaseEventRecord {
  source: 'engage';
  organization: string | null;
  benefits: string[] | null;
}

export type EventRecord = CalendarEventRecord | OrganizationEventRecord;

export interface EventCollection<T extends EventRecord = EventRecord> {
  lastUpdated: TimestampString;
  todayCount: number;
  items: Record<string, T>;
}
