/**
 * Boundaries to the world outside the pipeline. Implementations live in
 * lib/detectors, lib/frame-sources, lib/linger-alerts and lib/overlay.
 */

import type { AlertEvent, Detection, Frame, Roi, TrackedObject } from "./types";

export interface Detector {
  /**
   * Deterministic for identical inputs. Failures surface as DetectionError.
   * `signal` aborts once the caller has stopped waiting for the answer.
   */
  detect(
    frame: Frame,
    allowedClasses: ReadonlySet<string>,
    confidenceThreshold: number,
    signal?: AbortSignal
  ): Promise<Detection[]>;
}

export const END_OF_STREAM = Symbol("end-of-stream");
export type EndOfStream = typeof END_OF_STREAM;

/**
 * Pull-based frame supplier. Errors are AcquisitionError (transient unless `fatal`).
 */
export interface FrameSource {
  open(signal: AbortSignal): Promise<void>;
  nextFrame(signal: AbortSignal): Promise<Frame | EndOfStream>;
  close(): Promise<void>;
}

export interface Notifier {
  readonly name: string;
  /** Resolves false (or rejects) on failure; callers never block on it. */
  notify(event: AlertEvent): Promise<boolean>;
}

export interface Renderer {
  render(frame: Frame, tracked: TrackedObject[], roi: Roi): Frame;
}

export interface SnapshotStore {
  pathFor(camera: string, trackId: number, timestamp: number): string;
  save(frame: Frame, path: string): Promise<void>;
}
