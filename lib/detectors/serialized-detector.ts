/**
 * Detector sharing: one model instance behind a FIFO queue, or one per camera.
 */

import type { Detector } from "../camera-pipeline/collaborators";
import { DetectionError } from "../camera-pipeline/errors";
import type { Detection, Frame } from "../camera-pipeline/types";

interface QueuedCall {
  run: () => Promise<Detection[]>;
  resolve: (detections: Detection[]) => void;
  reject: (e: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Runs calls to the wrapped detector one at a time, in arrival order.
 * A failed call does not block the ones queued behind it. A queued call whose
 * signal aborts leaves the queue at once and rejects with DetectionError; the
 * running call gets the signal passed through.
 */
export class SerializedDetector implements Detector {
  private readonly waiting: QueuedCall[] = [];
  private busy = false;
  private dropped = 0;

  constructor(private readonly inner: Detector) {}

  /** Calls waiting or running. */
  get depth(): number {
    return this.waiting.length + (this.busy ? 1 : 0);
  }

  /** Queued calls dropped because their caller stopped waiting. */
  get abandoned(): number {
    return this.dropped;
  }

  detect(
    frame: Frame,
    allowedClasses: ReadonlySet<string>,
    confidenceThreshold: number,
    signal?: AbortSignal
  ): Promise<Detection[]> {
    if (signal?.aborted) {
      return Promise.reject(new DetectionError("detection abandoned before it was queued"));
    }
    return new Promise((resolve, reject) => {
      const call: QueuedCall = {
        run: () => this.inner.detect(frame, allowedClasses, confidenceThreshold, signal),
        resolve,
        reject,
        signal,
      };
      if (signal) {
        call.onAbort = () => {
          const index = this.waiting.indexOf(call);
          if (index < 0) return;
          this.waiting.splice(index, 1);
          this.dropped++;
          reject(new DetectionError("detection abandoned while queued"));
        };
        signal.addEventListener("abort", call.onAbort, { once: true });
      }
      this.waiting.push(call);
      this.drain();
    });
  }

  private drain(): void {
    if (this.busy) return;
    const call = this.waiting.shift();
    if (!call) return;
    if (call.signal && call.onAbort) call.signal.removeEventListener("abort", call.onAbort);

    this.busy = true;
    const next = () => {
      this.busy = false;
      this.drain();
    };
    void Promise.resolve()
      .then(call.run)
      .then(
        (detections) => {
          next();
          call.resolve(detections);
        },
        (e: unknown) => {
          next();
          call.reject(e);
        }
      );
  }
}

export type DetectorMode = "shared" | "per_camera";

export interface DetectorProvider {
  readonly mode: DetectorMode;
  forCamera(camera: string): Detector;
}

/**
 * shared: every camera gets the same serialized instance.
 * per_camera: one instance per camera name, created on first use.
 */
export function createDetectorProvider(mode: DetectorMode, factory: () => Detector): DetectorProvider {
  if (mode === "shared") {
    let shared: SerializedDetector | null = null;
    return {
      mode,
      forCamera() {
        shared ??= new SerializedDetector(factory());
        return shared;
      },
    };
  }

  const perCamera = new Map<string, Detector>();
  return {
    mode,
    forCamera(camera: string) {
      let detector = perCamera.get(camera);
      if (!detector) {
        detector = factory();
        perCamera.set(camera, detector);
      }
      return detector;
    },
  };
}
