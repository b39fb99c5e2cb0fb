/**
 * ffmpeg frame source: spawns ffmpeg to decode a camera URL into raw grayscale
 * frames on stdout and hands them out one at a time.
 *
 * Env: FFMPEG_PATH (ffmpeg).
 * Spawn ENOENT → fatal. Process exit or stall → transient. Clean exit → end of stream.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { END_OF_STREAM, type EndOfStream, type FrameSource } from "../camera-pipeline/collaborators";
import { AcquisitionError } from "../camera-pipeline/errors";
import type { Frame } from "../camera-pipeline/types";

export interface FfmpegSourceOptions {
  url: string;
  width: number;
  height: number;
  fps: number;
  /** No frame for this long → transient failure. */
  stallTimeoutMs?: number;
  /** Frames buffered ahead of the pipeline; oldest dropped beyond this. */
  maxQueuedFrames?: number;
  ffmpegPath?: string;
}

const DEFAULT_STALL_TIMEOUT_MS = 10000;
const DEFAULT_MAX_QUEUED = 2;
const STDERR_TAIL_LINES = 5;

function getFfmpegPath(): string {
  const v = process.env.FFMPEG_PATH;
  return v && v.length > 0 ? v : "ffmpeg";
}

export function buildFfmpegArgs(options: Pick<FfmpegSourceOptions, "url" | "width" | "height" | "fps">): string[] {
  const args = ["-hide_banner", "-loglevel", "error"];
  if (options.url.startsWith("rtsp://")) {
    args.push("-rtsp_transport", "tcp");
  }
  args.push(
    "-i",
    options.url,
    "-an",
    "-vf",
    `fps=${options.fps},scale=${options.width}:${options.height}`,
    "-f",
    "rawvideo",
    "-pix_fmt",
    "gray",
    "pipe:1"
  );
  return args;
}

/**
 * Cuts an arbitrary chunked byte stream into fixed-size frames.
 */
export class RawFrameAssembler {
  private readonly frameBytes: number;
  private partial: Buffer = Buffer.alloc(0);

  constructor(frameBytes: number) {
    if (frameBytes <= 0) throw new Error("frameBytes must be positive");
    this.frameBytes = frameBytes;
  }

  get pendingBytes(): number {
    return this.partial.length;
  }

  push(chunk: Buffer): Uint8Array[] {
    const data = this.partial.length > 0 ? Buffer.concat([this.partial, chunk]) : chunk;
    const frames: Uint8Array[] = [];
    let offset = 0;
    while (data.length - offset >= this.frameBytes) {
      // copy: the pipeline owns the frame after this point
      frames.push(Uint8Array.from(data.subarray(offset, offset + this.frameBytes)));
      offset += this.frameBytes;
    }
    this.partial = Buffer.from(data.subarray(offset));
    return frames;
  }

  reset(): void {
    this.partial = Buffer.alloc(0);
  }
}

interface Waiter {
  resolve: (v: Frame | EndOfStream) => void;
  reject: (e: AcquisitionError) => void;
}

export class FfmpegFrameSource implements FrameSource {
  private readonly options: Required<FfmpegSourceOptions>;
  private readonly assembler: RawFrameAssembler;
  private proc: ChildProcessWithoutNullStreams | null = null;
  private queue: Frame[] = [];
  private failure: AcquisitionError | null = null;
  private ended = false;
  private waiter: Waiter | null = null;
  private seq = 0;
  private stderrTail: string[] = [];
  private dropped = 0;

  constructor(options: FfmpegSourceOptions) {
    this.options = {
      stallTimeoutMs: DEFAULT_STALL_TIMEOUT_MS,
      maxQueuedFrames: DEFAULT_MAX_QUEUED,
      ffmpegPath: getFfmpegPath(),
      ...options,
    };
    this.assembler = new RawFrameAssembler(options.width * options.height);
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  async open(signal: AbortSignal): Promise<void> {
    if (signal.aborted) return;
    await this.close();
    this.queue = [];
    this.failure = null;
    this.ended = false;
    this.stderrTail = [];
    this.assembler.reset();

    const proc = spawn(this.options.ffmpegPath, buildFfmpegArgs(this.options), { stdio: "pipe" });
    this.proc = proc;

    proc.stdout.on("data", (chunk: Buffer) => {
      if (this.proc !== proc) return;
      for (const data of this.assembler.push(chunk)) {
        this.enqueue({
          seq: this.seq++,
          timestamp: Date.now(),
          width: this.options.width,
          height: this.options.height,
          channels: 1,
          data,
        });
      }
    });

    proc.stderr.on("data", (chunk: Buffer) => {
      const lines = chunk.toString("utf-8").split("\n").filter((l) => l.trim().length > 0);
      this.stderrTail = [...this.stderrTail, ...lines].slice(-STDERR_TAIL_LINES);
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (this.proc !== proc) return;
      const fatal = err.code === "ENOENT";
      this.fail(new AcquisitionError(`ffmpeg could not start: ${err.message}`, { fatal, cause: err }));
    });

    proc.on("close", (code) => {
      if (this.proc !== proc) return;
      this.proc = null;
      if (code === 0) {
        this.ended = true;
        this.wake();
        return;
      }
      const detail = this.stderrTail.length > 0 ? `: ${this.stderrTail.join(" | ")}` : "";
      this.fail(new AcquisitionError(`ffmpeg exited with code ${code ?? "unknown"}${detail}`));
    });
  }

  nextFrame(signal: AbortSignal): Promise<Frame | EndOfStream> {
    const ready = this.queue.shift();
    if (ready) return Promise.resolve(ready);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(END_OF_STREAM);
    if (!this.proc) return Promise.reject(new AcquisitionError("source is not open"));

    return new Promise<Frame | EndOfStream>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        this.waiter = null;
      };
      const onAbort = () => {
        cleanup();
        reject(new AcquisitionError("read aborted"));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new AcquisitionError(`no frame for ${this.options.stallTimeoutMs}ms`));
      }, this.options.stallTimeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiter = {
        resolve: (v) => {
          cleanup();
          resolve(v);
        },
        reject: (e) => {
          cleanup();
          reject(e);
        },
      };
    });
  }

  async close(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    this.queue = [];
    if (!proc || proc.exitCode !== null) return;
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        proc.kill("SIGKILL");
        resolve();
      }, 2000);
      proc.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      proc.kill("SIGTERM");
    });
  }

  private enqueue(frame: Frame): void {
    if (this.waiter) {
      this.waiter.resolve(frame);
      return;
    }
    this.queue.push(frame);
    while (this.queue.length > this.options.maxQueuedFrames) {
      this.queue.shift();
      this.dropped++;
    }
  }

  private fail(error: AcquisitionError): void {
    this.failure = error;
    this.waiter?.reject(error);
  }

  private wake(): void {
    this.waiter?.resolve(END_OF_STREAM);
  }
}
