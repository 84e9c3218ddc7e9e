import type { AlertState } from '../models/alert';
import type { NormalizedAlert } from '../normalizers/alertNormalizer';
import type { AlertStateStore } from '../services/alertStateStore';
import type { NotificationSender } from '../services/types';
import { CampusSyncError, NotificationDispatchFailureError } from '../utils/errors';

export type AlertDecision =
  | { status: 'idle'; reason: 'empty-feed' }
  | { status: 'idle'; reason: 'unchanged'; identity: string }
  | { status: 'notified'; identity: string; messageId: string; previous: AlertState };

export interface AlertDedupDeps {
  state: Pick<AlertStateStore, 'readState' | 'writeState' | 'publishAlert'>;
  notifier: NotificationSender;
  topic: string;
}

/**
 * Decides whether the latest alert is new against the persisted watermark.
 *
 * A new alert is published, then pushed, and only after the push is
 * accepted is the watermark advanced. A failure at any step leaves the
 * watermark behind, so the next run sees the alert as new again: a
 * duplicate push is possible, a missed one is not.
 */
export class AlertDedup {
  constructor(private readonly deps: AlertDedupDeps) {}

  async process(alert: NormalizedAlert | null): Promise<AlertDecision> {
    if (!alert) {
      return { status: 'idle', reason: 'empty-feed' };
    }

    const previous = await this.deps.state.readState();
    if (previous.lastAlertId === alert.identity) {
      return { status: 'idle', reason: 'unchanged', identity: alert.identity };
    }

    await this.deps.state.publishAlert(alert.record);
    const messageId = await this.dispatch(alert);
    await this.deps.state.writeState({
      lastAlertId: alert.identity,
      lastAlertPubDate: alert.record.pubDate,
    });

    return { status: 'notified', identity: alert.identity, messageId, previous };
  }

  private async dispatch(alert: NormalizedAlert): Promise<string> {
    const { record } = alert;
    try {
      return await this.deps.notifier.send({
        topic: this.deps.topic,
        title: record.title,
        body: record.description ?? record.link ?? '',
        data: { link: record.link ?? '' },
      });
    } catch (error) {
      if (error instanceof CampusSyncError) {
        throw error;
      }
      throw new NotificationDispatchFailureError('Push notification was not accepted', {
        topic: this.deps.topic,
        identity: alert.identity,
      }, { cause: error });
    }
  }
}
