/**
 * Object tracking: greedy IOU/centroid match, persistent integer ids, occlusion tolerance.
 *
 * Called only on frames where detection ran, so frame skipping never ages a track.
 */

import { bboxCenter, distance, iou, type Detection, type TrackedObject } from "./types";

export interface TrackerConfig {
  /** Max centroid distance (px) for a detection to continue a track. */
  distanceThreshold: number;
  /** Frames a track may go unmatched before it expires. */
  maxMissingFrames: number;
  /** Order overlapping pairs by IOU before distance. */
  useIou?: boolean;
}

interface Candidate {
  trackId: number;
  detIndex: number;
  overlap: number;
  dist: number;
}

export class Tracker {
  private readonly tracks = new Map<number, TrackedObject>();
  private nextTrackId = 1;
  private expired: number[] = [];

  constructor(private readonly config: TrackerConfig) {}

  /** Ids removed by the most recent update. */
  get lastExpired(): readonly number[] {
    return this.expired;
  }

  update(detections: Detection[], frameIndex: number, nowMs: number = Date.now()): TrackedObject[] {
    const candidates = this.candidates(detections);
    const matchedTracks = new Set<number>();
    const matchedDets = new Set<number>();

    for (const c of candidates) {
      if (matchedTracks.has(c.trackId) || matchedDets.has(c.detIndex)) continue;
      const track = this.tracks.get(c.trackId);
      const det = detections[c.detIndex];
      if (!track || !det) continue;
      matchedTracks.add(c.trackId);
      matchedDets.add(c.detIndex);
      this.tracks.set(c.trackId, {
        ...track,
        box: { ...det.box },
        centroid: bboxCenter(det.box),
        confidence: det.confidence,
        lastSeenFrame: frameIndex,
        missingFrameCount: 0,
      });
    }

    this.expired = [];
    for (const [id, track] of Array.from(this.tracks.entries())) {
      if (matchedTracks.has(id)) continue;
      const missing = track.missingFrameCount + 1;
      if (missing > this.config.maxMissingFrames) {
        this.tracks.delete(id);
        this.expired.push(id);
      } else {
        this.tracks.set(id, { ...track, missingFrameCount: missing });
      }
    }

    detections.forEach((det, index) => {
      if (matchedDets.has(index)) return;
      const id = this.nextTrackId++;
      this.tracks.set(id, {
        id,
        box: { ...det.box },
        centroid: bboxCenter(det.box),
        label: det.label,
        confidence: det.confidence,
        lastSeenFrame: frameIndex,
        missingFrameCount: 0,
        createdAt: nowMs,
      });
    });

    return this.active();
  }

  /** Current tracks ordered by id. Does not mutate. */
  active(): TrackedObject[] {
    return Array.from(this.tracks.values()).sort((a, b) => a.id - b.id);
  }

  /** Drop all tracks. The id counter keeps going so ids are never handed out twice. */
  reset(): void {
    this.tracks.clear();
    this.expired = [];
  }

  private candidates(detections: Detection[]): Candidate[] {
    const useIou = this.config.useIou ?? true;
    const out: Candidate[] = [];

    for (const track of Array.from(this.tracks.values())) {
      detections.forEach((det, detIndex) => {
        if (det.label !== track.label) return;
        const dist = distance(track.centroid, bboxCenter(det.box));
        if (dist > this.config.distanceThreshold) return;
        out.push({
          trackId: track.id,
          detIndex,
          overlap: useIou ? iou(track.box, det.box) : 0,
          dist,
        });
      });
    }

    return out.sort((a, b) => {
      const aOverlaps = a.overlap > 0 ? 1 : 0;
      const bOverlaps = b.overlap > 0 ? 1 : 0;
      if (aOverlaps !== bOverlaps) return bOverlaps - aOverlaps;
      if (a.overlap !== b.overlap) return b.overlap - a.overlap;
      if (a.dist !== b.dist) return a.dist - b.dist;
      if (a.detIndex !== b.detIndex) return a.detIndex - b.detIndex;
      return a.trackId - b.trackId;
    });
  }
}
