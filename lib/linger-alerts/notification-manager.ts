/**
 * Linger alert fan-out: AlertEvent → every enabled notifier.
 *
 * Never throws. Cooldown is already applied upstream by the linger monitor, so no
 * deduplication here. Each failure is logged as a NotificationError.
 */

import type { Notifier } from "../camera-pipeline/collaborators";
import { NotificationError, errorMessage } from "../camera-pipeline/errors";
import type { AlertEvent } from "../camera-pipeline/types";

export interface DeliveryReport {
  delivered: string[];
  failed: Array<{ notifier: string; reason: string }>;
}

export class NotificationManager implements Notifier {
  readonly name = "notification-manager";
  private lastReport: DeliveryReport = { delivered: [], failed: [] };

  constructor(private readonly notifiers: Notifier[]) {}

  get size(): number {
    return this.notifiers.length;
  }

  get report(): DeliveryReport {
    return this.lastReport;
  }

  async notify(event: AlertEvent): Promise<boolean> {
    const report: DeliveryReport = { delivered: [], failed: [] };

    await Promise.all(
      this.notifiers.map(async (notifier) => {
        try {
          const ok = await notifier.notify(event);
          if (ok) {
            report.delivered.push(notifier.name);
          } else {
            report.failed.push({ notifier: notifier.name, reason: "reported failure" });
          }
        } catch (e) {
          const err = e instanceof NotificationError ? e : new NotificationError(notifier.name, errorMessage(e), { cause: e });
          report.failed.push({ notifier: notifier.name, reason: err.message });
        }
      })
    );

    for (const f of report.failed) {
      console.error(`[LingerAlerts] ${f.notifier} failed for ${event.camera}/${event.trackId}: ${f.reason}`);
    }
    this.lastReport = report;
    return this.notifiers.length === 0 || report.delivered.length > 0;
  }
}
