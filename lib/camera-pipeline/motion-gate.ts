/**
 * Motion gate: decides per frame whether the detector runs this cycle.
 *
 * Detect when: blurred frame difference has a region >= minArea, OR the frame index
 * hits forceInterval, OR we are still inside the skipFrames hold-over window that
 * follows the last motion/forced trigger.
 */

import { boxBlur, diffMask, largestRegionArea, toGray, type GrayImage } from "./frame-ops";
import type { Frame } from "./types";

export interface MotionGateConfig {
  minArea: number;
  threshold: number;
  blurKernel: [number, number];
  skipFrames: number;
  forceInterval: number;
}

export type GateReason = "motion" | "forced" | "hold_over" | "idle";

export class MotionGate {
  private reference: GrayImage | null = null;
  private lastTriggerIndex: number | null = null;
  private score = 0;
  private reason: GateReason = "idle";

  constructor(private readonly config: MotionGateConfig) {}

  /** Largest changed region (pixels) measured on the last call. */
  get lastScore(): number {
    return this.score;
  }

  get lastReason(): GateReason {
    return this.reason;
  }

  shouldDetect(frame: Frame, frameIndex: number): boolean {
    this.score = this.measure(frame);

    const { minArea, forceInterval, skipFrames } = this.config;
    if (this.score >= minArea && this.score > 0) {
      this.reason = "motion";
    } else if (forceInterval > 0 && frameIndex % forceInterval === 0) {
      this.reason = "forced";
    } else if (this.lastTriggerIndex !== null && frameIndex - this.lastTriggerIndex < skipFrames) {
      this.reason = "hold_over";
      return true;
    } else {
      this.reason = "idle";
      return false;
    }

    this.lastTriggerIndex = frameIndex;
    return true;
  }

  reset(): void {
    this.reference = null;
    this.lastTriggerIndex = null;
    this.score = 0;
    this.reason = "idle";
  }

  private measure(frame: Frame): number {
    const [kw, kh] = this.config.blurKernel;
    const gray = toGray(frame);
    let blurred = boxBlur(gray, kw, kh);
    if (blurred === gray) {
      // unblurred gray may alias the frame buffer; keep our own copy
      blurred = { width: gray.width, height: gray.height, data: Uint8Array.from(gray.data) };
    }

    const prev = this.reference;
    this.reference = blurred;
    if (!prev || prev.width !== blurred.width || prev.height !== blurred.height) {
      return 0;
    }

    const mask = diffMask(prev, blurred, this.config.threshold);
    return largestRegionArea(mask, blurred.width, blurred.height);
  }
}
