export interface AlertRecord {
  title: string;
  description: string | null;
  link: string | null;
  /** ISO-8601 in the campus zone, or null when the feed item carries no date. */
  pubDate: string | null;
}

/** Watermark of the last alert a notification went out for. */
export interface AlertState {
  lastAlertId: string | null;
  lastAlertPubDate: string | null;
}

export const EMPTY_ALERT_STATE: AlertState = {
  lastAlertId: null,
  lastAlertPubDate: null,
};
