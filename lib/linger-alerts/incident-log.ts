/**
 * Incident log: one JSON line per linger alert.
 */

import { appendFile, mkdir } from "fs/promises";
import path from "path";
import type { Notifier } from "../camera-pipeline/collaborators";
import type { AlertEvent } from "../camera-pipeline/types";

export interface IncidentLogEntry {
  event_type: "linger_detected";
  event_id: string;
  camera_id: string;
  track_id: number;
  label: string;
  dwell_seconds: number;
  roi: [number, number, number, number];
  box: [number, number, number, number];
  snapshot_path: string | null;
  timestamp: string;
}

export function toIncidentLogEntry(event: AlertEvent): IncidentLogEntry {
  return {
    event_type: "linger_detected",
    event_id: event.id,
    camera_id: event.camera,
    track_id: event.trackId,
    label: event.label,
    dwell_seconds: Math.round(event.dwellSeconds * 10) / 10,
    roi: [event.roi.x1, event.roi.y1, event.roi.x2, event.roi.y2],
    box: [event.box.x1, event.box.y1, event.box.x2, event.box.y2],
    snapshot_path: event.snapshotPath,
    timestamp: new Date(event.timestamp).toISOString(),
  };
}

export class IncidentLogNotifier implements Notifier {
  readonly name = "incident-log";

  constructor(private readonly filePath: string) {}

  async notify(event: AlertEvent): Promise<boolean> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, JSON.stringify(toIncidentLogEntry(event)) + "\n", "utf-8");
    return true;
  }
}
