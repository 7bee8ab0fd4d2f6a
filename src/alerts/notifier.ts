/**
 * Operator alerting
 *
 * Called by the ingest loop when a device has used up its reconnect budget.
 */

import { BroadcastHub } from '../broadcast/hub';
import { STATUS_TOPIC, statusMessage } from '../broadcast/messages';
import { getLogger } from '../logger';

const log = getLogger('Alerts');

export interface AlertNotifier {
  notify(deviceId: string, reason: string): Promise<void>;
}

export class LogAlertNotifier implements AlertNotifier {
  async notify(deviceId: string, reason: string): Promise<void> {
    log.warn({ deviceId, reason }, 'Device needs manual intervention');
  }
}

/** Pushes the alert to every viewer on the status topic. */
export class BroadcastAlertNotifier implements AlertNotifier {
  private hub: BroadcastHub;

  constructor(hub: BroadcastHub) {
    this.hub = hub;
  }

  async notify(deviceId: string, reason: string): Promise<void> {
    await this.hub.publish(STATUS_TOPIC, statusMessage(`${deviceId}: ${reason}`));
  }
}

/** Fans one alert out to several notifiers; a failing one does not stop the rest. */
export class CompositeAlertNotifier implements AlertNotifier {
  private notifiers: AlertNotifier[];

  constructor(notifiers: AlertNotifier[]) {
    this.notifiers = notifiers;
  }

  async notify(deviceId: string, reason: string): Promise<void> {
    const results = await Promise.allSettled(this.notifiers.map((n) => n.notify(deviceId, reason)));
    for (const result of results) {
      if (result.status === 'rejected') {
        log.error({ deviceId, error: String(result.reason) }, 'Alert notifier failed');
      }
    }
  }
}
