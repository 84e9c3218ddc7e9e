import type { AlertFeedItem } from '../connectors/alertFeedConnector';
import type { ProviderConnector } from '../connectors/types';
import { normalizeLatestAlert } from '../normalizers/alertNormalizer';
import type { AlertDecision, AlertDedup } from '../sync/alertDedup';

export interface EmergencyAlertSyncDeps {
  connector: ProviderConnector<AlertFeedItem[]>;
  dedup: Pick<AlertDedup, 'process'>;
  timeZone: string;
}

export async function syncEmergencyAlerts(deps: EmergencyAlertSyncDeps): Promise<AlertDecision> {
  const items = await deps.connector.fetch();
  const latest = normalizeLatestAlert(items, deps.timeZone);
  return deps.dedup.process(latest);
}
