/**
 * Camera supervisor: one worker per camera, restart on crash, bounded shutdown.
 *
 * crashed        → restarted with backoff (fresh pipeline state)
 * fatal          → degraded, left stopped until reconfigured
 * end_of_stream  → done
 * requested      → done
 */

import { backoffDelay, sleep } from "./backoff";
import type { CameraSettings, CameraWorker, WorkerState } from "./camera-worker";
import { ConfigurationError, errorMessage } from "./errors";

export interface RestartPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  /** Crashes tolerated before the camera is left degraded. */
  maxRestarts: number;
}

export interface SupervisorOptions {
  createWorker: (camera: CameraSettings) => CameraWorker;
  restart?: Partial<RestartPolicy>;
  /** Delay between launching consecutive cameras. */
  startStaggerMs?: number;
}

export interface CameraStatus {
  camera: string;
  state: WorkerState | { kind: "rejected"; error: string };
  degraded: boolean;
  restarts: number;
}

export interface ShutdownResult {
  stopped: string[];
  abandoned: string[];
}

interface Slot {
  settings: CameraSettings;
  worker: CameraWorker | null;
  restarts: number;
  degraded: boolean;
  rejected: string | null;
  done: boolean;
  task: Promise<void>;
}

const DEFAULT_RESTART: RestartPolicy = {
  initialDelayMs: 2000,
  maxDelayMs: 60000,
  maxRestarts: Number.POSITIVE_INFINITY,
};

export class CameraSupervisor {
  private readonly slots = new Map<string, Slot>();
  private readonly shutdownController = new AbortController();
  private readonly restartPolicy: RestartPolicy;
  private readonly createWorker: (camera: CameraSettings) => CameraWorker;
  private readonly startStaggerMs: number;

  constructor(options: SupervisorOptions) {
    this.createWorker = options.createWorker;
    this.restartPolicy = { ...DEFAULT_RESTART, ...options.restart };
    this.startStaggerMs = options.startStaggerMs ?? 0;
  }

  /** Launch every camera. Names must be unique; duplicates are rejected. */
  start(cameras: CameraSettings[]): void {
    let launched = 0;
    for (const camera of cameras) {
      if (this.slots.has(camera.name)) {
        console.error(`[Supervisor] duplicate camera name "${camera.name}"; skipped`);
        continue;
      }
      const slot: Slot = {
        settings: camera,
        worker: null,
        restarts: 0,
        degraded: false,
        rejected: null,
        done: false,
        task: Promise.resolve(),
      };
      this.slots.set(camera.name, slot);
      slot.task = this.supervise(slot, launched * this.startStaggerMs);
      launched++;
    }
    console.log(`[Supervisor] supervising ${this.slots.size} camera(s)`);
  }

  status(): CameraStatus[] {
    return Array.from(this.slots.values()).map((slot) => {
      const state: CameraStatus["state"] = slot.rejected
        ? { kind: "rejected", error: slot.rejected }
        : slot.worker
          ? slot.worker.state
          : { kind: "starting" };
      return {
        camera: slot.settings.name,
        state,
        degraded: slot.degraded || state.kind === "reconnecting",
        restarts: slot.restarts,
      };
    });
  }

  worker(camera: string): CameraWorker | null {
    return this.slots.get(camera)?.worker ?? null;
  }

  /** Resolves once every camera has finished on its own or through shutdown. */
  async wait(): Promise<void> {
    await Promise.all(Array.from(this.slots.values()).map((s) => s.task));
  }

  /**
   * Signal every worker and wait up to `timeoutMs` for them to stop.
   * Workers still running after that are abandoned and logged.
   */
  async shutdown(timeoutMs: number): Promise<ShutdownResult> {
    console.log(`[Supervisor] shutting down ${this.slots.size} camera(s)`);
    this.shutdownController.abort();

    const slots = Array.from(this.slots.values());
    for (const slot of slots) {
      slot.worker?.stop().catch((e: unknown) => {
        console.error(`[Supervisor] stop failed for ${slot.settings.name}:`, errorMessage(e));
      });
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([Promise.all(slots.map((s) => s.task)), deadline]);
    clearTimeout(timer);

    const result: ShutdownResult = { stopped: [], abandoned: [] };
    for (const slot of slots) {
      if (slot.done) {
        result.stopped.push(slot.settings.name);
      } else {
        result.abandoned.push(slot.settings.name);
        console.error(
          `[Supervisor] camera ${slot.settings.name} did not stop within ${timeoutMs}ms; abandoned`
        );
      }
    }
    return result;
  }

  private async supervise(slot: Slot, initialDelayMs: number): Promise<void> {
    const signal = this.shutdownController.signal;
    const name = slot.settings.name;
    try {
      if (initialDelayMs > 0 && !(await sleep(initialDelayMs, signal))) return;

      while (!signal.aborted) {
        let worker: CameraWorker;
        try {
          worker = this.createWorker(slot.settings);
        } catch (e) {
          if (!(e instanceof ConfigurationError)) throw e;
          slot.rejected = e.message;
          console.error(`[Supervisor] not starting ${name}: ${e.message}`);
          return;
        }
        slot.worker = worker;

        try {
          const reason = await worker.run();
          if (reason === "fatal") {
            slot.degraded = true;
            console.error(`[Supervisor] ${name} degraded: source needs reconfiguration`);
          }
          return;
        } catch (e) {
          if (signal.aborted) return;
          slot.restarts++;
          if (slot.restarts > this.restartPolicy.maxRestarts) {
            slot.degraded = true;
            console.error(`[Supervisor] ${name} crashed ${slot.restarts} times; giving up:`, errorMessage(e));
            return;
          }
          const delay = backoffDelay(slot.restarts, this.restartPolicy.initialDelayMs, this.restartPolicy.maxDelayMs);
          console.warn(`[Supervisor] ${name} crashed (${errorMessage(e)}); restart #${slot.restarts} in ${delay}ms`);
          if (!(await sleep(delay, signal))) return;
        }
      }
    } catch (e) {
      slot.degraded = true;
      console.error(`[Supervisor] supervision of ${name} failed:`, errorMessage(e));
    } finally {
      slot.done = true;
    }
  }
}
