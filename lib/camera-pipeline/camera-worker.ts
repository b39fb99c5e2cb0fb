/**
 * Camera worker: one camera, one loop, frames strictly in arrival order.
 *
 * frame → MotionGate → (gated) Detector → Tracker → LingerMonitor → snapshot + notify
 *
 * States: starting → running ⇄ reconnecting → stopped.
 * An outage lasts from the first failure until the next frame actually arrives; the
 * backoff attempt count grows across every reconnect inside it. Tracker and linger state
 * survive only when the outage is shorter than reconnect.stateGraceMs (default 0: always discarded).
 */

import { ABORTED, backoffDelay, sleep, untilAborted, withTimeout } from "./backoff";
import {
  END_OF_STREAM,
  type Detector,
  type FrameSource,
  type Notifier,
  type Renderer,
  type SnapshotStore,
} from "./collaborators";
import { AcquisitionError, DetectionError, RenderError, errorMessage } from "./errors";
import { LingerMonitor } from "./linger-monitor";
import { MotionGate, type GateReason, type MotionGateConfig } from "./motion-gate";
import { Tracker, type TrackerConfig } from "./tracker";
import type { AlertEvent, Detection, Frame, LingerRecord, Roi, TrackedObject } from "./types";

export interface CameraSettings {
  name: string;
  url: string;
  classes: string[];
  confidenceThreshold: number;
  roi: Roi;
  motion: MotionGateConfig;
  tracking: TrackerConfig;
  lingerTimeSeconds: number;
  cooldownSeconds: number;
}

export interface ReconnectPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  /** Outages shorter than this keep tracker/linger state. */
  stateGraceMs: number;
}

export type StopReason = "requested" | "end_of_stream" | "fatal" | "crashed";

export type WorkerState =
  | { kind: "starting" }
  | { kind: "running"; since: number }
  | { kind: "reconnecting"; attempt: number; since: number; lastError: string }
  | { kind: "stopped"; reason: StopReason; error?: string };

export interface FrameUpdate {
  camera: string;
  frame: Frame;
  tracked: TrackedObject[];
  detected: boolean;
  gateReason: GateReason;
  motionScore: number;
  alerts: AlertEvent[];
}

export interface WorkerStats {
  frames: number;
  detectionsRun: number;
  detectionErrors: number;
  alerts: number;
  reconnects: number;
  stateResets: number;
}

export interface CameraWorkerOptions {
  camera: CameraSettings;
  source: FrameSource;
  detector: Detector;
  notifier?: Notifier;
  renderer?: Renderer;
  snapshots?: SnapshotStore;
  reconnect?: Partial<ReconnectPolicy>;
  /** Bound on one detector call; 0 waits forever. */
  detectionTimeoutMs?: number;
  clock?: () => number;
  onFrame?: (update: FrameUpdate) => void;
}

const DEFAULT_RECONNECT: ReconnectPolicy = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  stateGraceMs: 0,
};
const DEFAULT_DETECTION_TIMEOUT_MS = 10000;

interface Outage {
  start: number;
  attempts: number;
  /** false while the very first open is still being retried */
  afterRun: boolean;
}

type ConnectResult = { ok: true } | { ok: false; reason: "requested" } | { ok: false; reason: "fatal"; error: AcquisitionError };

export class CameraWorker {
  readonly name: string;

  private readonly camera: CameraSettings;
  private readonly source: FrameSource;
  private readonly detector: Detector;
  private readonly notifier?: Notifier;
  private readonly renderer?: Renderer;
  private readonly snapshots?: SnapshotStore;
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly detectionTimeoutMs: number;
  private readonly clock: () => number;
  private readonly onFrame?: (update: FrameUpdate) => void;
  private readonly allowedClasses: ReadonlySet<string>;
  private readonly tag: string;

  private readonly gate: MotionGate;
  private readonly tracker: Tracker;
  private readonly linger: LingerMonitor;

  private readonly abort = new AbortController();
  private readonly pending = new Set<Promise<void>>();
  private current: WorkerState = { kind: "starting" };
  private tracked: TrackedObject[] = [];
  private frameIndex = 0;
  private sourceOpen = false;
  private outage: Outage | null = null;
  private running: Promise<StopReason> | null = null;
  private readonly counters: WorkerStats = {
    frames: 0,
    detectionsRun: 0,
    detectionErrors: 0,
    alerts: 0,
    reconnects: 0,
    stateResets: 0,
  };

  constructor(options: CameraWorkerOptions) {
    this.camera = options.camera;
    this.name = options.camera.name;
    this.source = options.source;
    this.detector = options.detector;
    this.notifier = options.notifier;
    this.renderer = options.renderer;
    this.snapshots = options.snapshots;
    this.reconnectPolicy = { ...DEFAULT_RECONNECT, ...options.reconnect };
    this.detectionTimeoutMs = options.detectionTimeoutMs ?? DEFAULT_DETECTION_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
    this.onFrame = options.onFrame;
    this.allowedClasses = new Set(options.camera.classes);
    this.tag = `[CameraWorker:${this.name}]`;

    this.gate = new MotionGate(options.camera.motion);
    this.tracker = new Tracker(options.camera.tracking);
    this.linger = new LingerMonitor({
      camera: options.camera.name,
      lingerTimeSeconds: options.camera.lingerTimeSeconds,
      cooldownSeconds: options.camera.cooldownSeconds,
    });
  }

  get state(): WorkerState {
    return this.current;
  }

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  stats(): WorkerStats {
    return { ...this.counters };
  }

  /** Tracks reused on skipped frames. */
  trackedObjects(): TrackedObject[] {
    return this.tracked.map((t) => ({ ...t }));
  }

  lingerRecords(): Map<number, LingerRecord> {
    return this.linger.records();
  }

  /**
   * Run the loop until stopped. Resolves with the stop reason; rejects (after moving to
   * stopped/crashed) on an unexpected error so the supervisor can restart the camera.
   */
  run(): Promise<StopReason> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /** Cooperative stop: finish the current cycle, release the source, exit. */
  async stop(): Promise<void> {
    if (!this.abort.signal.aborted) {
      console.log(`${this.tag} stop requested`);
      this.abort.abort();
    }
    if (this.running) {
      await this.running.then(
        () => undefined,
        () => undefined
      );
    }
  }

  /** Wait for in-flight notifications (fire-and-forget otherwise). */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async loop(): Promise<StopReason> {
    const signal = this.abort.signal;
    this.setState({ kind: "starting" });
    console.log(`${this.tag} starting (${this.camera.url})`);

    try {
      const opened = await this.connect(null);
      if (!opened.ok) {
        return this.finish(opened.reason, opened.reason === "fatal" ? opened.error : undefined);
      }

      while (!signal.aborted) {
        let next: Frame | typeof END_OF_STREAM | typeof ABORTED;
        try {
          next = await untilAborted(this.source.nextFrame(signal), signal, (e) =>
            console.debug(`${this.tag} frame read after stop failed:`, errorMessage(e))
          );
        } catch (e) {
          if (signal.aborted) break;
          if (!(e instanceof AcquisitionError)) throw e;
          if (e.fatal) return this.finish("fatal", e);
          const resumed = await this.reconnect(e);
          if (!resumed.ok) {
            return this.finish(resumed.reason, resumed.reason === "fatal" ? resumed.error : undefined);
          }
          continue;
        }

        if (next === ABORTED) break;
        if (next === END_OF_STREAM) return this.finish("end_of_stream");
        this.endOutage();
        await this.processFrame(next);
      }

      return this.finish("requested");
    } catch (e) {
      this.finish("crashed", e);
      throw e;
    } finally {
      await this.releaseSource();
    }
  }

  private async processFrame(frame: Frame): Promise<void> {
    const index = this.frameIndex++;
    const now = this.clock();
    this.counters.frames++;

    let detected = false;
    if (this.gate.shouldDetect(frame, index)) {
      this.counters.detectionsRun++;
      let detections: Detection[];
      try {
        detections = await this.detect(frame);
      } catch (e) {
        // cycle skipped: tracked set and linger records stay as they are
        this.counters.detectionErrors++;
        console.warn(`${this.tag} detection failed on frame ${frame.seq}:`, errorMessage(e));
        this.emitFrame(frame, false, []);
        return;
      }
      this.tracked = this.tracker.update(detections, index, now);
      detected = true;
    }

    const lingerEvents = this.linger.evaluate(this.tracked, this.camera.roi, now);
    const alerts: AlertEvent[] = [];
    for (const pendingEvent of lingerEvents) {
      const snapshotPath = await this.captureSnapshot(frame, pendingEvent);
      const event: AlertEvent = Object.freeze({ ...pendingEvent, snapshotPath });
      alerts.push(event);
      this.counters.alerts++;
      console.info(
        `${this.tag} linger alert: track ${event.trackId} (${event.label}) ${event.dwellSeconds.toFixed(1)}s in ROI`
      );
      this.dispatch(event);
    }

    this.emitFrame(frame, detected, alerts);
  }

  private async detect(frame: Frame): Promise<Detection[]> {
    const call = new AbortController();
    const cancel = () => call.abort();
    this.abort.signal.addEventListener("abort", cancel, { once: true });
    try {
      return await withTimeout(
        this.detector.detect(frame, this.allowedClasses, this.camera.confidenceThreshold, call.signal),
        this.detectionTimeoutMs,
        () => {
          call.abort();
          return new DetectionError(`detector did not answer within ${this.detectionTimeoutMs}ms`);
        },
        (e) => console.debug(`${this.tag} abandoned detection failed late:`, errorMessage(e))
      );
    } catch (e) {
      throw e instanceof DetectionError ? e : new DetectionError(errorMessage(e), { cause: e });
    } finally {
      this.abort.signal.removeEventListener("abort", cancel);
    }
  }

  private async captureSnapshot(frame: Frame, event: AlertEvent): Promise<string | null> {
    if (!this.snapshots) return null;
    try {
      const annotated = this.renderer ? this.renderer.render(frame, this.tracked, this.camera.roi) : frame;
      const path = this.snapshots.pathFor(this.name, event.trackId, event.timestamp);
      await this.snapshots.save(annotated, path);
      return path;
    } catch (e) {
      const kind = e instanceof RenderError ? "render" : "snapshot";
      console.warn(`${this.tag} ${kind} failed for track ${event.trackId}:`, errorMessage(e));
      return null;
    }
  }

  private dispatch(event: AlertEvent): void {
    const notifier = this.notifier;
    if (!notifier) return;
    const task = Promise.resolve()
      .then(() => notifier.notify(event))
      .then((ok) => {
        if (!ok) console.warn(`${this.tag} notifier ${notifier.name} reported failure for ${event.id}`);
      })
      .catch((e: unknown) => {
        console.error(`${this.tag} notifier ${notifier.name} error:`, errorMessage(e));
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private emitFrame(frame: Frame, detected: boolean, alerts: AlertEvent[]): void {
    if (!this.onFrame) return;
    try {
      this.onFrame({
        camera: this.name,
        frame,
        tracked: this.tracked,
        detected,
        gateReason: this.gate.lastReason,
        motionScore: this.gate.lastScore,
        alerts,
      });
    } catch (e) {
      console.warn(`${this.tag} frame observer failed:`, errorMessage(e));
    }
  }

  private async reconnect(cause: AcquisitionError): Promise<ConnectResult> {
    this.counters.reconnects++;
    console.warn(`${this.tag} source failed, reconnecting:`, cause.message);
    await this.releaseSource();
    this.beginOutage().afterRun = true;
    return this.connect(cause);
  }

  private beginOutage(): Outage {
    this.outage ??= { start: this.clock(), attempts: 0, afterRun: false };
    return this.outage;
  }

  /** First frame after a failure: the outage is over. */
  private endOutage(): void {
    const outage = this.outage;
    if (!outage) return;
    this.outage = null;
    if (!outage.afterRun) return;

    const outageMs = this.clock() - outage.start;
    if (outageMs >= this.reconnectPolicy.stateGraceMs) {
      this.resetPipelineState();
      console.log(`${this.tag} recovered after ${outageMs}ms; tracking state discarded`);
    } else {
      console.log(`${this.tag} recovered after ${outageMs}ms; tracking state kept`);
    }
  }

  private async connect(initialError: AcquisitionError | null): Promise<ConnectResult> {
    const signal = this.abort.signal;
    const { initialDelayMs, maxDelayMs } = this.reconnectPolicy;
    let lastError = initialError ? initialError.message : null;

    while (!signal.aborted) {
      if (lastError !== null) {
        const outage = this.beginOutage();
        outage.attempts++;
        this.setState({ kind: "reconnecting", attempt: outage.attempts, since: outage.start, lastError });
        const delay = backoffDelay(outage.attempts, initialDelayMs, maxDelayMs);
        if (!(await sleep(delay, signal))) break;
      }

      try {
        const opened = await untilAborted(this.source.open(signal), signal, (e) =>
          console.debug(`${this.tag} open after stop failed:`, errorMessage(e))
        );
        if (opened === ABORTED) break;
        this.sourceOpen = true;
        this.setState({ kind: "running", since: this.clock() });
        return { ok: true };
      } catch (e) {
        if (signal.aborted) break;
        if (!(e instanceof AcquisitionError)) throw e;
        if (e.fatal) return { ok: false, reason: "fatal", error: e };
        lastError = e.message;
        console.warn(`${this.tag} connect attempt ${(this.outage?.attempts ?? 0) + 1} failed:`, e.message);
      }
    }

    return { ok: false, reason: "requested" };
  }

  private resetPipelineState(): void {
    this.tracker.reset();
    this.linger.reset();
    this.gate.reset();
    this.tracked = [];
    this.counters.stateResets++;
  }

  private async releaseSource(): Promise<void> {
    if (!this.sourceOpen) return;
    this.sourceOpen = false;
    try {
      await this.source.close();
    } catch (e) {
      console.warn(`${this.tag} closing source failed:`, errorMessage(e));
    }
  }

  private finish(reason: StopReason, error?: unknown): StopReason {
    this.setState(
      error === undefined ? { kind: "stopped", reason } : { kind: "stopped", reason, error: errorMessage(error) }
    );
    const detail = error === undefined ? "" : `: ${errorMessage(error)}`;
    if (reason === "crashed" || reason === "fatal") {
      console.error(`${this.tag} stopped (${reason})${detail}`);
    } else {
      console.log(`${this.tag} stopped (${reason})`);
    }
    return reason;
  }

  private setState(next: WorkerState): void {
    this.current = next;
  }
}
