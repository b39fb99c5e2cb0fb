/**
 * Camera pipeline: shared data model
 *
 * Frame → (gated) Detection[] → TrackedObject[] → AlertEvent[].
 * All coordinates are frame pixels; all timestamps are epoch milliseconds.
 */

export interface Bbox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Point {
  x: number;
  y: number;
}

/** Region of interest: axis-aligned rectangle, edges inclusive. */
export type Roi = Bbox;

export type FrameChannels = 1 | 3 | 4;

/**
 * One decoded frame. `data` is row-major, interleaved, `width * height * channels` bytes.
 * Owned by the stage currently processing it.
 */
export interface Frame {
  seq: number;
  timestamp: number;
  width: number;
  height: number;
  channels: FrameChannels;
  data: Uint8Array;
}

export interface Detection {
  box: Bbox;
  label: string;
  confidence: number;
}

export interface TrackedObject {
  id: number;
  box: Bbox;
  centroid: Point;
  label: string;
  confidence: number;
  lastSeenFrame: number;
  missingFrameCount: number;
  createdAt: number;
}

export interface LingerRecord {
  enteredRoiAt: number | null;
  alerted: boolean;
  lastAlertAt: number | null;
}

export interface AlertEvent {
  readonly id: string;
  readonly trackId: number;
  readonly camera: string;
  readonly roi: Roi;
  readonly label: string;
  readonly box: Bbox;
  readonly dwellSeconds: number;
  readonly snapshotPath: string | null;
  readonly timestamp: number;
}

export function bboxCenter(box: Bbox): Point {
  return { x: (box.x1 + box.x2) / 2, y: (box.y1 + box.y2) / 2 };
}

export function bboxArea(box: Bbox): number {
  return Math.max(0, box.x2 - box.x1) * Math.max(0, box.y2 - box.y1);
}

export function iou(a: Bbox, b: Bbox): number {
  const xi1 = Math.max(a.x1, b.x1);
  const yi1 = Math.max(a.y1, b.y1);
  const xi2 = Math.min(a.x2, b.x2);
  const yi2 = Math.min(a.y2, b.y2);
  const inter = Math.max(0, xi2 - xi1) * Math.max(0, yi2 - yi1);
  const union = bboxArea(a) + bboxArea(b) - inter;
  return union <= 0 ? 0 : inter / union;
}

export function isPointInRoi(point: Point, roi: Roi): boolean {
  return point.x >= roi.x1 && point.x <= roi.x2 && point.y >= roi.y1 && point.y <= roi.y2;
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
