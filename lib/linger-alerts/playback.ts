/**
 * Linger alert playback: one clip at a time, callers never wait.
 *
 * afplay on macOS, ffplay elsewhere. A missing player is logged and the queue moves on.
 */

import { spawn } from "child_process";
import path from "path";

export type PlayerCommand = "afplay" | "ffplay";

export function defaultPlayer(): PlayerCommand {
  return process.platform === "darwin" ? "afplay" : "ffplay";
}

export function getPlayArgs(cmd: PlayerCommand, filePath: string): string[] {
  return cmd === "afplay" ? [filePath] : ["-nodisp", "-autoexit", "-loglevel", "quiet", filePath];
}

/** Starts the player for one file and calls `done` when it exits or fails to start. */
export type LaunchPlayer = (cmd: PlayerCommand, args: string[], done: () => void) => void;

const spawnPlayer: LaunchPlayer = (cmd, args, done) => {
  const child = spawn(cmd, args, { stdio: "ignore", detached: true });
  child.on("error", (err) => {
    console.warn("[LingerPlayback] error:", err.message);
    done();
  });
  child.on("close", (code) => {
    console.log("[LingerPlayback] end:", args[args.length - 1], "code:", code ?? "unknown");
    done();
  });
  child.unref();
};

export class PlaybackQueue {
  private readonly queue: string[] = [];
  private playing = false;

  constructor(
    private readonly cmd: PlayerCommand = defaultPlayer(),
    private readonly launch: LaunchPlayer = spawnPlayer
  ) {}

  /** Clips waiting plus the one playing. */
  get pending(): number {
    return this.queue.length + (this.playing ? 1 : 0);
  }

  enqueue(audioPath: string): void {
    if (!audioPath) return;
    this.queue.push(path.isAbsolute(audioPath) ? audioPath : path.join(process.cwd(), audioPath));
    this.drain();
  }

  private drain(): void {
    if (this.playing) return;
    const next = this.queue.shift();
    if (next === undefined) return;

    this.playing = true;
    console.log("[LingerPlayback] start:", next);
    let finished = false;
    const done = () => {
      if (finished) return;
      finished = true;
      this.playing = false;
      this.drain();
    };
    try {
      this.launch(this.cmd, getPlayArgs(this.cmd, next), done);
    } catch (e) {
      console.warn("[LingerPlayback] spawn failed:", e instanceof Error ? e.message : e);
      done();
    }
  }
}

const sharedQueue = new PlaybackQueue();

/** Queue a clip on the process-wide player. Returns immediately. */
export function playAudioNonBlocking(audioPath: string): void {
  sharedQueue.enqueue(audioPath);
}
