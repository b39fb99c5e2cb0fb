/**
 * Integration tests: CameraWorker loop against scripted sources and detectors.
 */

import { SerializedDetector } from "../../detectors/serialized-detector";
import { backoffDelay } from "../backoff";
import { CameraWorker, type CameraWorkerOptions, type FrameUpdate, type WorkerState } from "../camera-worker";
import { END_OF_STREAM, type Detector, type Renderer, type SnapshotStore } from "../collaborators";
import { AcquisitionError } from "../errors";
import type { Detection, Frame } from "../types";
import {
  RecordingNotifier,
  ScriptedDetector,
  ScriptedSource,
  cameraSettings,
  det,
  makeFrame,
  silenceConsole,
  type SourceStep,
} from "./fakes";

const PERSON = det({ x1: 40, y1: 40, x2: 60, y2: 60 });

function frames(count: number, startSeq = 0): Frame[] {
  return Array.from({ length: count }, (_, i) => makeFrame(startSeq + i, (startSeq + i) * 1000));
}

/** Records the worker state each time the source is (re)opened. */
class ObservedSource extends ScriptedSource {
  readonly seen: WorkerState[] = [];
  worker: CameraWorker | null = null;

  async open(): Promise<void> {
    if (this.worker) this.seen.push(this.worker.state);
    return super.open();
  }
}

function observed(steps: SourceStep[]): { worker: CameraWorker; source: ObservedSource } {
  const source = new ObservedSource(steps);
  const worker = new CameraWorker({
    camera: cameraSettings(),
    source,
    detector: new ScriptedDetector([[PERSON]]),
    clock: () => source.now,
    reconnect: { initialDelayMs: 1, maxDelayMs: 5 },
  });
  source.worker = worker;
  return { worker, source };
}

function reconnectAttempts(seen: WorkerState[]): Array<[number, number]> {
  return seen.flatMap((s): Array<[number, number]> => (s.kind === "reconnecting" ? [[s.attempt, s.since]] : []));
}

interface Harness {
  worker: CameraWorker;
  source: ScriptedSource;
  updates: FrameUpdate[];
}

function harness(
  steps: SourceStep[],
  detector: Detector,
  overrides: Partial<CameraWorkerOptions> = {},
  openFailures: Error[] = []
): Harness {
  const source = new ScriptedSource(steps, openFailures);
  const updates: FrameUpdate[] = [];
  const worker = new CameraWorker({
    camera: cameraSettings(),
    source,
    detector,
    clock: () => source.now,
    reconnect: { initialDelayMs: 1, maxDelayMs: 5 },
    onFrame: (u) => updates.push(u),
    ...overrides,
  });
  return { worker, source, updates };
}

describe("CameraWorker", () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("alerts once after the linger time even when one detection cycle fails", async () => {
    const notifier = new RecordingNotifier();
    const detector = new ScriptedDetector([[PERSON], [PERSON], [PERSON], new Error("model offline"), [PERSON]]);
    const { worker, updates } = harness([...frames(7), END_OF_STREAM], detector, { notifier });

    await expect(worker.run()).resolves.toBe("end_of_stream");
    await worker.flush();

    expect(notifier.events.map((e) => [e.trackId, e.timestamp, e.dwellSeconds])).toEqual([[1, 5000, 5]]);
    expect(updates[3]).toMatchObject({ detected: false, alerts: [] });
    expect(updates[3].tracked.map((t) => t.id)).toEqual([1]);
    expect(worker.stats()).toEqual({
      frames: 7,
      detectionsRun: 7,
      detectionErrors: 1,
      alerts: 1,
      reconnects: 0,
      stateResets: 0,
    });
  });

  it("keeps evaluating linger on frames the motion gate skips", async () => {
    const detector = new ScriptedDetector([[PERSON]]);
    const camera = cameraSettings({
      motion: { minArea: 1, threshold: 10, blurKernel: [1, 1], skipFrames: 0, forceInterval: 100 },
    });
    const { worker, updates } = harness([...frames(7), END_OF_STREAM], detector, { camera });

    await worker.run();

    expect(detector.calls).toBe(1);
    expect(updates.map((u) => u.detected)).toEqual([true, false, false, false, false, false, false]);
    expect(updates[1].gateReason).toBe("idle");
    expect(updates.flatMap((u) => u.alerts.map((a) => a.timestamp))).toEqual([5000]);
  });

  it("discards tracking state after a reconnect with the default grace", async () => {
    const detector = new ScriptedDetector([[PERSON]]);
    const { worker, source, updates } = harness(
      [...frames(2), new AcquisitionError("stream dropped"), ...frames(1, 2), END_OF_STREAM],
      detector
    );

    await worker.run();

    expect(updates.map((u) => u.tracked.map((t) => t.id))).toEqual([[1], [1], [2]]);
    expect(worker.stats()).toMatchObject({ reconnects: 1, stateResets: 1 });
    expect(source.opens).toBe(2);
    expect(source.closes).toBe(2);
  });

  it("keeps tracking state when the outage is within the grace period", async () => {
    const detector = new ScriptedDetector([[PERSON]]);
    const { worker, updates } = harness(
      [...frames(2), new AcquisitionError("stream dropped"), ...frames(1, 2), END_OF_STREAM],
      detector,
      { reconnect: { initialDelayMs: 1, maxDelayMs: 5, stateGraceMs: 10000 } }
    );

    await worker.run();

    expect(updates.map((u) => u.tracked.map((t) => t.id))).toEqual([[1], [1], [1]]);
    expect(worker.stats()).toMatchObject({ reconnects: 1, stateResets: 0 });
    expect(worker.lingerRecords().get(1)?.enteredRoiAt).toBe(0);
  });

  it("grows the backoff across reconnects until a frame arrives", async () => {
    const dropped = () => new AcquisitionError("read timed out");
    const { worker, source } = observed([
      ...frames(1),
      dropped(),
      dropped(),
      dropped(),
      dropped(),
      dropped(),
      ...frames(1, 1),
      END_OF_STREAM,
    ]);

    await expect(worker.run()).resolves.toBe("end_of_stream");

    const attempts = reconnectAttempts(source.seen);
    expect(attempts).toEqual([
      [1, 0],
      [2, 0],
      [3, 0],
      [4, 0],
      [5, 0],
    ]);
    expect(attempts.map(([attempt]) => backoffDelay(attempt, 1, 5))).toEqual([1, 2, 4, 5, 5]);
    expect(worker.stats()).toMatchObject({ reconnects: 5, stateResets: 1 });
  });

  it("starts a fresh outage after a frame has been received", async () => {
    const { worker, source } = observed([
      ...frames(1),
      new AcquisitionError("read timed out"),
      ...frames(1, 1),
      new AcquisitionError("read timed out"),
      ...frames(1, 2),
      END_OF_STREAM,
    ]);

    await worker.run();

    expect(reconnectAttempts(source.seen)).toEqual([
      [1, 0],
      [1, 1000],
    ]);
    expect(worker.stats()).toMatchObject({ reconnects: 2, stateResets: 2 });
  });

  it("retries a transient open failure with backoff", async () => {
    const { worker, source } = harness(
      [...frames(1), END_OF_STREAM],
      new ScriptedDetector([[]]),
      {},
      [new AcquisitionError("connection refused"), new AcquisitionError("connection refused")]
    );

    await expect(worker.run()).resolves.toBe("end_of_stream");
    expect(source.opens).toBe(3);
  });

  it("stops as fatal when the source cannot be opened at all", async () => {
    const { worker, source } = harness([], new ScriptedDetector([[]]), {}, [
      new AcquisitionError("no such stream", { fatal: true }),
    ]);

    await expect(worker.run()).resolves.toBe("fatal");
    expect(worker.state).toEqual({ kind: "stopped", reason: "fatal", error: "no such stream" });
    expect(source.closes).toBe(0);
  });

  it("stops as fatal on a fatal read error and releases the source", async () => {
    const { worker, source } = harness(
      [...frames(1), new AcquisitionError("ffmpeg missing", { fatal: true })],
      new ScriptedDetector([[]])
    );

    await expect(worker.run()).resolves.toBe("fatal");
    expect(source.closes).toBe(1);
  });

  it("rejects and reports crashed on an unexpected error", async () => {
    const { worker, source } = harness([new TypeError("boom")], new ScriptedDetector([[]]));

    await expect(worker.run()).rejects.toThrow("boom");
    expect(worker.state).toEqual({ kind: "stopped", reason: "crashed", error: "boom" });
    expect(source.closes).toBe(1);
  });

  it("stops cooperatively while waiting for the next frame", async () => {
    let firstFrame: () => void = () => undefined;
    const seen = new Promise<void>((resolve) => {
      firstFrame = resolve;
    });
    const { worker, source } = harness(frames(1), new ScriptedDetector([[]]), { onFrame: () => firstFrame() });

    const running = worker.run();
    await seen;
    await worker.stop();

    await expect(running).resolves.toBe("requested");
    expect(worker.state).toEqual({ kind: "stopped", reason: "requested" });
    expect(source.closes).toBe(1);
  });

  it("treats a detector that never answers as a failed cycle", async () => {
    const hanging: Detector = { detect: () => new Promise<Detection[]>(() => undefined) };
    const { worker } = harness([...frames(1), END_OF_STREAM], hanging, { detectionTimeoutMs: 20 });

    await expect(worker.run()).resolves.toBe("end_of_stream");
    expect(worker.stats()).toMatchObject({ detectionsRun: 1, detectionErrors: 1 });
  });

  it("does not pile up timed-out calls on a shared detector", async () => {
    let started = 0;
    const stuck: Detector = {
      detect: () => {
        started++;
        return new Promise<Detection[]>(() => undefined);
      },
    };
    const shared = new SerializedDetector(stuck);
    const { worker } = harness([...frames(3), END_OF_STREAM], shared, { detectionTimeoutMs: 10 });

    await expect(worker.run()).resolves.toBe("end_of_stream");

    expect(worker.stats()).toMatchObject({ detectionsRun: 3, detectionErrors: 3 });
    expect(started).toBe(1);
    expect(shared.depth).toBe(1);
    expect(shared.abandoned).toBe(2);
  });

  it("keeps running when the notifier throws", async () => {
    const notifier = new RecordingNotifier("broken", "throw");
    const { worker } = harness([...frames(7), END_OF_STREAM], new ScriptedDetector([[PERSON]]), { notifier });

    await expect(worker.run()).resolves.toBe("end_of_stream");
    await worker.flush();

    expect(notifier.events).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith("[CameraWorker:cam-test] notifier broken error:", "broken is down");
  });

  it("attaches the annotated snapshot path to the alert", async () => {
    const saved: Array<{ path: string; frame: Frame }> = [];
    const snapshots: SnapshotStore = {
      pathFor: (camera, trackId, timestamp) => `/snapshots/${camera}/${trackId}-${timestamp}.png`,
      save: async (frame, path) => {
        saved.push({ path, frame });
      },
    };
    const renderer: Renderer = {
      render: (frame) => ({ ...frame, data: new Uint8Array(frame.data.length).fill(7) }),
    };
    const notifier = new RecordingNotifier();
    const { worker } = harness([...frames(6), END_OF_STREAM], new ScriptedDetector([[PERSON]]), {
      notifier,
      snapshots,
      renderer,
    });

    await worker.run();
    await worker.flush();

    expect(saved.map((s) => s.path)).toEqual(["/snapshots/cam-test/1-5000.png"]);
    expect(saved[0].frame.data[0]).toBe(7);
    expect(notifier.events[0].snapshotPath).toBe("/snapshots/cam-test/1-5000.png");
  });

  it("still alerts without a path when the snapshot cannot be saved", async () => {
    const snapshots: SnapshotStore = {
      pathFor: () => "/snapshots/unwritable.png",
      save: async () => {
        throw new Error("disk full");
      },
    };
    const notifier = new RecordingNotifier();
    const { worker } = harness([...frames(6), END_OF_STREAM], new ScriptedDetector([[PERSON]]), {
      notifier,
      snapshots,
    });

    await worker.run();
    await worker.flush();

    expect(notifier.events.map((e) => e.snapshotPath)).toEqual([null]);
  });
});
