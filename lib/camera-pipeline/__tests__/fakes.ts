/**
 * In-process stand-ins for the pipeline's collaborators.
 */

import { END_OF_STREAM, type Detector, type EndOfStream, type FrameSource, type Notifier } from "../collaborators";
import type { CameraSettings } from "../camera-worker";
import type { AlertEvent, Bbox, Detection, Frame } from "../types";

export function makeFrame(seq: number, timestamp: number, fill = 0, width = 32, height = 32): Frame {
  return {
    seq,
    timestamp,
    width,
    height,
    channels: 1,
    data: new Uint8Array(width * height).fill(fill),
  };
}

export function det(box: Bbox, label = "person", confidence = 0.9): Detection {
  return { box, label, confidence };
}

export function cameraSettings(overrides: Partial<CameraSettings> = {}): CameraSettings {
  return {
    name: "cam-test",
    url: "rtsp://test/stream",
    classes: ["person"],
    confidenceThreshold: 0.5,
    roi: { x1: 0, y1: 0, x2: 100, y2: 100 },
    motion: { minArea: 1, threshold: 10, blurKernel: [1, 1], skipFrames: 0, forceInterval: 1 },
    tracking: { distanceThreshold: 50, maxMissingFrames: 3 },
    lingerTimeSeconds: 5,
    cooldownSeconds: 60,
    ...overrides,
  };
}

export type SourceStep = Frame | Error | EndOfStream;

/**
 * Hands out scripted frames/errors in order. When the script runs out the next read
 * waits until aborted. `now` is the timestamp of the last frame handed out.
 */
export class ScriptedSource implements FrameSource {
  now = 0;
  opens = 0;
  closes = 0;
  private readonly steps: SourceStep[];
  private readonly openFailures: Error[];

  constructor(steps: SourceStep[], openFailures: Error[] = []) {
    this.steps = [...steps];
    this.openFailures = [...openFailures];
  }

  async open(): Promise<void> {
    this.opens++;
    const failure = this.openFailures.shift();
    if (failure) throw failure;
  }

  nextFrame(signal: AbortSignal): Promise<Frame | EndOfStream> {
    const step = this.steps.shift();
    if (step === undefined) {
      return new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    if (step === END_OF_STREAM) return Promise.resolve(END_OF_STREAM);
    if (step instanceof Error) return Promise.reject(step);
    this.now = step.timestamp;
    return Promise.resolve(step);
  }

  async close(): Promise<void> {
    this.closes++;
  }
}

/** Returns scripted results per call; the last entry repeats. */
export class ScriptedDetector implements Detector {
  calls = 0;
  private readonly results: Array<Detection[] | Error>;

  constructor(results: Array<Detection[] | Error>) {
    this.results = results;
  }

  async detect(): Promise<Detection[]> {
    const index = Math.min(this.calls, this.results.length - 1);
    this.calls++;
    const result = this.results[index];
    if (result instanceof Error) throw result;
    return result.map((d) => ({ ...d, box: { ...d.box } }));
  }
}

export class RecordingNotifier implements Notifier {
  readonly name: string;
  readonly events: AlertEvent[] = [];

  constructor(
    name = "recording",
    private readonly behaviour: "ok" | "fail" | "throw" = "ok"
  ) {
    this.name = name;
  }

  async notify(event: AlertEvent): Promise<boolean> {
    this.events.push(event);
    if (this.behaviour === "throw") throw new Error(`${this.name} is down`);
    return this.behaviour === "ok";
  }
}

export function silenceConsole(): void {
  for (const method of ["log", "info", "debug", "warn", "error"] as const) {
    jest.spyOn(console, method).mockImplementation(() => undefined);
  }
}
