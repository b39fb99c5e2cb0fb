/**
 * Linger monitor: per-track dwell timer inside the ROI with cooldown-gated alerts.
 *
 * Outside → Entering → Lingering → (alert, cooldown, alert …) → Exiting → Outside.
 * A track that missed this cycle is judged at its last box: it can still alert, but it
 * never starts or ends a stay. Tracks absent from the input have expired and lose their record.
 */

import { randomUUID } from "crypto";
import { isPointInRoi, type AlertEvent, type LingerRecord, type Roi, type TrackedObject } from "./types";

export interface LingerMonitorConfig {
  camera: string;
  lingerTimeSeconds: number;
  cooldownSeconds: number;
}

export class LingerMonitor {
  private readonly state = new Map<number, LingerRecord>();

  constructor(private readonly config: LingerMonitorConfig) {}

  evaluate(trackedObjects: TrackedObject[], roi: Roi, nowMs: number): AlertEvent[] {
    const lingerMs = this.config.lingerTimeSeconds * 1000;
    const cooldownMs = this.config.cooldownSeconds * 1000;
    const events: AlertEvent[] = [];
    const present = new Set<number>();

    const ordered = [...trackedObjects].sort((a, b) => a.id - b.id);
    for (const obj of ordered) {
      present.add(obj.id);
      let record = this.state.get(obj.id);

      if (obj.missingFrameCount > 0) {
        if (!record || record.enteredRoiAt === null) continue;
      } else if (!isPointInRoi(obj.centroid, roi)) {
        if (record) {
          console.debug(`[LingerMonitor:${this.config.camera}] track ${obj.id} left ROI`);
          this.state.delete(obj.id);
        }
        continue;
      } else if (!record || record.enteredRoiAt === null) {
        record = { enteredRoiAt: nowMs, alerted: false, lastAlertAt: null };
        this.state.set(obj.id, record);
        console.debug(`[LingerMonitor:${this.config.camera}] track ${obj.id} entered ROI`);
      }
      if (record.enteredRoiAt === null) continue;

      const dwellMs = nowMs - record.enteredRoiAt;
      if (dwellMs < lingerMs) continue;
      const coolingDown =
        record.alerted && record.lastAlertAt !== null && nowMs - record.lastAlertAt < cooldownMs;
      if (coolingDown) continue;

      record.alerted = true;
      record.lastAlertAt = nowMs;
      events.push(
        Object.freeze({
          id: randomUUID(),
          trackId: obj.id,
          camera: this.config.camera,
          roi: { ...roi },
          label: obj.label,
          box: { ...obj.box },
          dwellSeconds: dwellMs / 1000,
          snapshotPath: null,
          timestamp: nowMs,
        })
      );
    }

    for (const id of Array.from(this.state.keys())) {
      if (!present.has(id)) this.state.delete(id);
    }

    return events;
  }

  /** Read-only copy of the per-track records. */
  records(): Map<number, LingerRecord> {
    const copy = new Map<number, LingerRecord>();
    for (const [id, record] of Array.from(this.state.entries())) {
      copy.set(id, { ...record });
    }
    return copy;
  }

  reset(): void {
    this.state.clear();
  }
}
