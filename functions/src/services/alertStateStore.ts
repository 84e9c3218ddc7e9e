import type { AlertRecord, AlertState } from '../models/alert';
import { EMPTY_ALERT_STATE } from '../models/alert';
import type { OverwriteStore } from './types';

export const ALERT_ROOT_PATH = 'emergencyAlert';
const CURRENT_PATH = `${ALERT_ROOT_PATH}/current`;
const STATE_PATH = `${ALERT_ROOT_PATH}/state`;

/**
 * The alert domain's slice of the realtime store: the alert shown to
 * clients under `current`, the dedup watermark under `state`.
 */
export class AlertStateStore {
  constructor(private readonly store: OverwriteStore) {}

  async readState(): Promise<AlertState> {
    const value = await this.store.readValue(STATE_PATH);
    if (typeof value !== 'object' || value === null) {
      return { ...EMPTY_ALERT_STATE };
    }
    return {
      lastAlertId: 'lastAlertId' in value && typeof value.lastAlertId === 'string' ? value.lastAlertId : null,
      lastAlertPubDate: 'lastAlertPubDate' in value && typeof value.lastAlertPubDate === 'string'
        ? value.lastAlertPubDate
        : null,
    };
  }

  async writeState(state: AlertState): Promise<void> {
    await this.store.put(STATE_PATH, state);
  }

  async publishAlert(record: AlertRecord): Promise<void> {
    await this.store.put(CURRENT_PATH, record);
  }
}
