/**
 * Voice alert: OS TTS (say / espeak) with a generated beep as fallback.
 *
 * Env: LINGER_ALERT_TEMPLATE, LINGER_ALERTS_DIR (./alerts), DRY_RUN.
 * Audio is written to <alerts dir>/audio and queued on the local player.
 */

import { spawn } from "child_process";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { Notifier } from "../camera-pipeline/collaborators";
import { NotificationError, errorMessage } from "../camera-pipeline/errors";
import type { AlertEvent } from "../camera-pipeline/types";
import { playAudioNonBlocking } from "./playback";

const DEFAULT_TEMPLATE = "Attention. Someone has been lingering at {camera} for {seconds} seconds.";

export function getAlertsDir(): string {
  const v = process.env.LINGER_ALERTS_DIR;
  return v && v.length > 0 ? v : path.join(process.cwd(), "alerts");
}

function isDryRun(): boolean {
  return process.env.DRY_RUN === "1" || process.env.DRY_RUN === "true";
}

/** Spoken line for an alert. Placeholders: {camera}, {track}, {label}, {seconds}. */
export function buildAlertText(event: Pick<AlertEvent, "camera" | "trackId" | "label" | "dwellSeconds">): string {
  const template = process.env.LINGER_ALERT_TEMPLATE || DEFAULT_TEMPLATE;
  return template
    .replace(/\{camera\}/g, event.camera)
    .replace(/\{track\}/g, String(event.trackId))
    .replace(/\{label\}/g, event.label)
    .replace(/\{seconds\}/g, String(Math.round(event.dwellSeconds)));
}

export function safeFileToken(value: string, max: number): string {
  return value.replace(/[^a-zA-Z0-9-_]/g, "_").slice(0, max);
}

/**
 * 0.4s 880Hz mono 16-bit PCM WAV.
 */
export function buildBeepWav(): Buffer {
  const sampleRate = 8000;
  const durationSec = 0.4;
  const freq = 880;
  const numSamples = Math.round(sampleRate * durationSec);
  const buffer = Buffer.alloc(44 + numSamples * 2);
  let offset = 0;
  const write = (str: string) => {
    buffer.write(str, offset);
    offset += str.length;
  };
  const writeU32 = (n: number) => {
    buffer.writeUInt32LE(n, offset);
    offset += 4;
  };
  const writeU16 = (n: number) => {
    buffer.writeUInt16LE(n, offset);
    offset += 2;
  };
  write("RIFF");
  writeU32(36 + numSamples * 2);
  write("WAVE");
  write("fmt ");
  writeU32(16);
  writeU16(1);
  writeU16(1);
  writeU32(sampleRate);
  writeU32(sampleRate * 2);
  writeU16(2);
  writeU16(16);
  write("data");
  writeU32(numSamples * 2);
  for (let i = 0; i < numSamples; i++) {
    const t = i / sampleRate;
    buffer.writeInt16LE(Math.floor(32767 * 0.3 * Math.sin(2 * Math.PI * freq * t)), offset);
    offset += 2;
  }
  return buffer;
}

function runTts(cmd: string, args: string[]): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(cmd, args, { stdio: "ignore" });
    child.on("close", (code) => (code === 0 ? resolve() : reject(new Error(`${cmd} exited ${code}`))));
    child.on("error", reject);
  });
}

export interface VoiceAlertResult {
  success: boolean;
  audioPath?: string;
  voiceUsed: "tts" | "beep" | "dry_run";
  error?: string;
}

export class VoiceAlertNotifier implements Notifier {
  readonly name = "voice";

  constructor(private readonly play: (audioPath: string) => void = playAudioNonBlocking) {}

  async notify(event: AlertEvent): Promise<boolean> {
    const result = await this.speak(event);
    if (!result.success) {
      throw new NotificationError(this.name, result.error ?? "no audio produced");
    }
    return true;
  }

  async speak(event: AlertEvent): Promise<VoiceAlertResult> {
    const text = buildAlertText(event);
    if (isDryRun()) {
      console.log("[LingerVoice] dry run:", text);
      return { success: true, voiceUsed: "dry_run" };
    }

    const dir = path.join(getAlertsDir(), "audio");
    const ts = new Date(event.timestamp).toISOString().replace(/[:.]/g, "-").slice(0, 19);
    const base = `${ts}_${safeFileToken(event.camera, 24)}_${event.trackId}`;

    let ttsError: string | undefined;
    try {
      await mkdir(dir, { recursive: true });
      const wavPath = path.join(dir, `${base}_voice.wav`);
      if (process.platform === "darwin") {
        await runTts("say", ["-o", wavPath, "--data-format=LEI16@22050", text]);
        this.play(wavPath);
        return { success: true, audioPath: wavPath, voiceUsed: "tts" };
      }
      if (process.platform === "linux") {
        await runTts("espeak", ["-w", wavPath, text]);
        this.play(wavPath);
        return { success: true, audioPath: wavPath, voiceUsed: "tts" };
      }
    } catch (e) {
      ttsError = errorMessage(e);
      console.warn("[LingerVoice] TTS unavailable, using beep:", ttsError);
    }

    try {
      const beepPath = path.join(dir, `${base}_beep.wav`);
      await mkdir(dir, { recursive: true });
      await writeFile(beepPath, buildBeepWav());
      this.play(beepPath);
      return { success: true, audioPath: beepPath, voiceUsed: "beep", error: ttsError };
    } catch (e) {
      return { success: false, voiceUsed: "beep", error: errorMessage(e) };
    }
  }
}
