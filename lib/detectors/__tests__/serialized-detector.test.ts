import { withTimeout } from "../../camera-pipeline/backoff";
import type { Detector } from "../../camera-pipeline/collaborators";
import type { Detection, Frame } from "../../camera-pipeline/types";
import { SerializedDetector, createDetectorProvider } from "../serialized-detector";

function frame(seq: number): Frame {
  return { seq, timestamp: seq, width: 1, height: 1, channels: 1, data: new Uint8Array(1) };
}

/** Records call order and how many calls overlap. */
class SlowDetector implements Detector {
  order: number[] = [];
  active = 0;
  maxActive = 0;

  async detect(f: Frame): Promise<Detection[]> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setImmediate(resolve));
    this.active--;
    if (f.seq === 1) throw new Error("bad frame");
    this.order.push(f.seq);
    return [];
  }
}

/** Each call stays pending until the test releases it. */
class GatedDetector implements Detector {
  started: number[] = [];
  private readonly pending: Array<() => void> = [];

  detect(f: Frame): Promise<Detection[]> {
    this.started.push(f.seq);
    return new Promise((resolve) => {
      this.pending.push(() => resolve([]));
    });
  }

  finishNext(): void {
    const release = this.pending.shift();
    if (release) release();
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("SerializedDetector", () => {
  it("runs calls one at a time in arrival order", async () => {
    const inner = new SlowDetector();
    const shared = new SerializedDetector(inner);
    const all = [0, 2, 3].map((seq) => shared.detect(frame(seq), new Set(), 0.5));
    expect(shared.depth).toBe(3);

    await Promise.all(all);

    expect(inner.order).toEqual([0, 2, 3]);
    expect(inner.maxActive).toBe(1);
    expect(shared.depth).toBe(0);
  });

  it("keeps serving after a failed call", async () => {
    const inner = new SlowDetector();
    const shared = new SerializedDetector(inner);
    const results = await Promise.allSettled([0, 1, 2].map((seq) => shared.detect(frame(seq), new Set(), 0.5)));

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    expect(inner.order).toEqual([0, 2]);
  });
});

describe("SerializedDetector cancellation", () => {
  it("drops a queued call as soon as its caller gives up", async () => {
    const inner = new GatedDetector();
    const shared = new SerializedDetector(inner);
    const caller = new AbortController();
    const first = shared.detect(frame(0), new Set(), 0.5);
    const second = shared.detect(frame(1), new Set(), 0.5, caller.signal);
    const third = shared.detect(frame(2), new Set(), 0.5);
    expect(shared.depth).toBe(3);

    caller.abort();
    expect(shared.depth).toBe(2);
    await expect(second).rejects.toThrow("detection abandoned while queued");

    await settle();
    inner.finishNext();
    await expect(first).resolves.toEqual([]);
    await settle();
    inner.finishNext();
    await expect(third).resolves.toEqual([]);

    expect(inner.started).toEqual([0, 2]);
    expect(shared.abandoned).toBe(1);
    expect(shared.depth).toBe(0);
  });

  it("refuses a call whose caller has already given up", async () => {
    const inner = new GatedDetector();
    const caller = new AbortController();
    caller.abort();

    await expect(new SerializedDetector(inner).detect(frame(0), new Set(), 0.5, caller.signal)).rejects.toThrow(
      "detection abandoned before it was queued"
    );
    expect(inner.started).toEqual([]);
  });

  it("hands the caller's signal to the running call", async () => {
    let seen: AbortSignal | undefined;
    const inner: Detector = {
      detect: async (_f, _classes, _threshold, signal) => {
        seen = signal;
        return [];
      },
    };
    const caller = new AbortController();

    await new SerializedDetector(inner).detect(frame(0), new Set(), 0.5, caller.signal);

    expect(seen).toBe(caller.signal);
  });

  it("stays at most one deep when every caller times out on a slow model", async () => {
    const slow: Detector = {
      detect: () => new Promise<Detection[]>((resolve) => setTimeout(() => resolve([]), 50)),
    };
    const shared = new SerializedDetector(slow);
    let timeouts = 0;
    let deepest = 0;

    for (let seq = 0; seq < 20; seq++) {
      const caller = new AbortController();
      try {
        await withTimeout(
          shared.detect(frame(seq), new Set(), 0.5, caller.signal),
          10,
          () => {
            caller.abort();
            return new Error("timed out");
          },
          () => undefined
        );
      } catch {
        timeouts++;
      }
      deepest = Math.max(deepest, shared.depth);
    }

    expect(timeouts).toBe(20);
    expect(deepest).toBeLessThanOrEqual(1);
    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(shared.depth).toBe(0);
  });
});

describe("createDetectorProvider", () => {
  it("hands every camera the same serialized instance in shared mode", () => {
    let built = 0;
    const provider = createDetectorProvider("shared", () => {
      built++;
      return new SlowDetector();
    });
    expect(built).toBe(0);

    const a = provider.forCamera("front-door");
    const b = provider.forCamera("parking");
    expect(a).toBe(b);
    expect(a).toBeInstanceOf(SerializedDetector);
    expect(built).toBe(1);
  });

  it("builds one detector per camera in per_camera mode", () => {
    let built = 0;
    const provider = createDetectorProvider("per_camera", () => {
      built++;
      return new SlowDetector();
    });

    const a = provider.forCamera("front-door");
    expect(provider.forCamera("front-door")).toBe(a);
    expect(provider.forCamera("parking")).not.toBe(a);
    expect(built).toBe(2);
    expect(provider.mode).toBe("per_camera");
  });
});
