/**
 * Overlay renderer: draws the ROI and tracked boxes onto a copy of the frame.
 *
 * ROI: blue (gray 255). Active tracks: green (gray 200). Occluded tracks: amber (gray 120).
 */

import type { Renderer } from "../camera-pipeline/collaborators";
import { RenderError } from "../camera-pipeline/errors";
import type { Bbox, Frame, Roi, TrackedObject } from "../camera-pipeline/types";

interface Paint {
  rgb: [number, number, number];
  gray: number;
}

const ROI_COLOR: Paint = { rgb: [0, 128, 255], gray: 255 };
const TRACK_COLOR: Paint = { rgb: [0, 255, 0], gray: 200 };
const OCCLUDED_COLOR: Paint = { rgb: [255, 191, 0], gray: 120 };

export class OverlayRenderer implements Renderer {
  constructor(private readonly thickness: number = 2) {}

  render(frame: Frame, tracked: TrackedObject[], roi: Roi): Frame {
    const expected = frame.width * frame.height * frame.channels;
    if (frame.width <= 0 || frame.height <= 0 || frame.data.length < expected) {
      throw new RenderError(`cannot draw on ${frame.width}x${frame.height}x${frame.channels} frame`);
    }

    const out: Frame = { ...frame, data: Uint8Array.from(frame.data.subarray(0, expected)) };
    this.drawRect(out, roi, ROI_COLOR);
    for (const obj of tracked) {
      this.drawRect(out, obj.box, obj.missingFrameCount > 0 ? OCCLUDED_COLOR : TRACK_COLOR);
    }
    return out;
  }

  private drawRect(frame: Frame, box: Bbox, color: Paint): void {
    const x1 = clampInt(box.x1, frame.width - 1);
    const y1 = clampInt(box.y1, frame.height - 1);
    const x2 = clampInt(box.x2, frame.width - 1);
    const y2 = clampInt(box.y2, frame.height - 1);
    if (x2 < x1 || y2 < y1) return;

    for (let t = 0; t < this.thickness; t++) {
      for (let x = x1; x <= x2; x++) {
        this.setPixel(frame, x, Math.min(y1 + t, y2), color);
        this.setPixel(frame, x, Math.max(y2 - t, y1), color);
      }
      for (let y = y1; y <= y2; y++) {
        this.setPixel(frame, Math.min(x1 + t, x2), y, color);
        this.setPixel(frame, Math.max(x2 - t, x1), y, color);
      }
    }
  }

  private setPixel(frame: Frame, x: number, y: number, color: Paint): void {
    const p = (y * frame.width + x) * frame.channels;
    if (frame.channels === 1) {
      frame.data[p] = color.gray;
      return;
    }
    frame.data[p] = color.rgb[0];
    frame.data[p + 1] = color.rgb[1];
    frame.data[p + 2] = color.rgb[2];
    if (frame.channels === 4) frame.data[p + 3] = 255;
  }
}

function clampInt(v: number, max: number): number {
  return Math.max(0, Math.min(max, Math.round(v)));
}
