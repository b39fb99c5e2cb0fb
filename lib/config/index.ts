/**
 * Monitor configuration: JSON file + env defaults.
 *
 * Env: LINGER_COOLDOWN_SECONDS (60), LINGER_SAVE_DIR (./detections),
 *      LINGER_DETECTION_TIMEOUT_MS (10000), LINGER_SHUTDOWN_TIMEOUT_MS (10000).
 * A malformed camera is rejected on its own; the rest still load.
 */

import { readFile } from "fs/promises";
import path from "path";
import type { CameraSettings, ReconnectPolicy } from "../camera-pipeline/camera-worker";
import { ConfigurationError, errorMessage } from "../camera-pipeline/errors";
import type { RestartPolicy } from "../camera-pipeline/supervisor";
import type { MotionGateConfig } from "../camera-pipeline/motion-gate";
import type { DetectorMode } from "../detectors/serialized-detector";
import type { EmailSettings } from "../linger-alerts/email";

export const DEFAULT_CONFIG_PATH = "./monitor.config.json";

const DEFAULT_CLASSES = ["person"];
const DEFAULT_CONFIDENCE = 0.5;
const DEFAULT_SKIP_FRAMES = 5;
const DEFAULT_FORCE_INTERVAL = 25;
const DEFAULT_MIN_AREA = 5000;
const DEFAULT_MOTION_THRESHOLD = 25;
const DEFAULT_BLUR_KERNEL: [number, number] = [21, 21];
const DEFAULT_LINGER_SECONDS = 5;
const DEFAULT_TRACKING_DISTANCE = 75;
const DEFAULT_MAX_MISSING = 5;
const DEFAULT_COOLDOWN_SECONDS = 60;
const DEFAULT_SAVE_DIR = "./detections";
const DEFAULT_DETECTION_TIMEOUT_MS = 10000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10000;
const DEFAULT_FRAME = { width: 640, height: 360, fps: 5 };

function envNumber(name: string, fallback: number, min = 0): number {
  const v = process.env[name];
  if (v === undefined || v === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

function getCooldownSeconds(): number {
  return envNumber("LINGER_COOLDOWN_SECONDS", DEFAULT_COOLDOWN_SECONDS);
}

function getSaveDir(): string {
  const v = process.env.LINGER_SAVE_DIR;
  return v && v.length > 0 ? v : DEFAULT_SAVE_DIR;
}

function getDetectionTimeoutMs(): number {
  return envNumber("LINGER_DETECTION_TIMEOUT_MS", DEFAULT_DETECTION_TIMEOUT_MS);
}

function getShutdownTimeoutMs(): number {
  return envNumber("LINGER_SHUTDOWN_TIMEOUT_MS", DEFAULT_SHUTDOWN_TIMEOUT_MS);
}

export interface FrameSize {
  width: number;
  height: number;
  fps: number;
}

export interface CameraConfig extends CameraSettings {
  frame: FrameSize;
}

export interface DetectionDefaults {
  classes: string[];
  confidenceThreshold: number;
  motion: MotionGateConfig;
  detector: DetectorMode;
  timeoutMs: number;
  frame: FrameSize;
}

export interface AlertingConfig {
  cooldownSeconds: number;
  saveDirectory: string;
  voice: boolean;
  incidentLog: string | null;
  email: EmailSettings | null;
}

export interface MonitorConfig {
  cameras: CameraConfig[];
  rejected: ConfigurationError[];
  detection: DetectionDefaults;
  alerting: AlertingConfig;
  reconnect: ReconnectPolicy;
  restart: RestartPolicy;
  shutdownTimeoutMs: number;
}

type Raw = Record<string, unknown>;

function isRecord(v: unknown): v is Raw {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function section(raw: Raw, key: string, camera: string | null): Raw {
  const v = raw[key];
  if (v === undefined || v === null) return {};
  if (!isRecord(v)) throw new ConfigurationError(`"${key}" must be an object`, camera);
  return v;
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

function num(raw: Raw, key: string, fallback: number, camera: string | null, rule: NumberRule = {}): number {
  const v = raw[key];
  if (v === undefined || v === null) return fallback;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new ConfigurationError(`"${key}" must be a number`, camera);
  }
  if (rule.integer && !Number.isInteger(v)) throw new ConfigurationError(`"${key}" must be an integer`, camera);
  if (rule.min !== undefined && v < rule.min) throw new ConfigurationError(`"${key}" must be >= ${rule.min}`, camera);
  if (rule.max !== undefined && v > rule.max) throw new ConfigurationError(`"${key}" must be <= ${rule.max}`, camera);
  return v;
}

function bool(raw: Raw, key: string, fallback: boolean, camera: string | null): boolean {
  const v = raw[key];
  if (v === undefined || v === null) return fallback;
  if (typeof v !== "boolean") throw new ConfigurationError(`"${key}" must be true or false`, camera);
  return v;
}

function str(raw: Raw, key: string, camera: string | null): string | undefined {
  const v = raw[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v !== "string" || v.trim() === "") throw new ConfigurationError(`"${key}" must be a non-empty string`, camera);
  return v.trim();
}

function classList(raw: Raw, key: string, fallback: string[], camera: string | null): string[] {
  const v = raw[key];
  if (v === undefined || v === null) return fallback;
  if (!Array.isArray(v) || v.length === 0 || !v.every((c) => typeof c === "string" && c.trim() !== "")) {
    throw new ConfigurationError(`"${key}" must be a non-empty list of class names`, camera);
  }
  return v.map((c: string) => c.trim().toLowerCase());
}

function numberTuple(raw: Raw, key: string, size: number, camera: string | null): number[] | undefined {
  const v = raw[key];
  if (v === undefined || v === null) return undefined;
  if (!Array.isArray(v) || v.length !== size || !v.every((n) => typeof n === "number" && Number.isFinite(n))) {
    throw new ConfigurationError(`"${key}" must be a list of ${size} numbers`, camera);
  }
  return v.map((n: number) => n);
}

function parseMotion(raw: Raw, base: MotionGateConfig, camera: string | null): MotionGateConfig {
  const m = section(raw, "motion_detection", camera);
  const kernel = numberTuple(m, "blur_kernel", 2, camera);
  if (kernel && kernel.some((k) => k < 1 || !Number.isInteger(k) || k % 2 === 0)) {
    throw new ConfigurationError('"blur_kernel" sizes must be odd positive integers', camera);
  }
  return {
    minArea: num(m, "min_area", base.minArea, camera, { min: 1 }),
    threshold: num(m, "threshold", base.threshold, camera, { min: 0, max: 255 }),
    blurKernel: kernel ? [kernel[0], kernel[1]] : base.blurKernel,
    skipFrames: num(raw, "skip_frames", base.skipFrames, camera, { min: 0, integer: true }),
    forceInterval: num(raw, "force_interval", base.forceInterval, camera, { min: 0, integer: true }),
  };
}

function parseFrame(raw: Raw, base: FrameSize, camera: string | null): FrameSize {
  const f = section(raw, "frame", camera);
  return {
    width: num(f, "width", base.width, camera, { min: 16, integer: true }),
    height: num(f, "height", base.height, camera, { min: 16, integer: true }),
    fps: num(f, "fps", base.fps, camera, { min: 0.1, max: 60 }),
  };
}

function parseDetectorMode(v: unknown): DetectorMode {
  if (v === undefined || v === null || v === "shared") return "shared";
  if (v === "per_camera") return "per_camera";
  throw new ConfigurationError('"detector" must be "shared" or "per_camera"');
}

export function parseDetectionDefaults(raw: Raw): DetectionDefaults {
  const d = section(raw, "detection", null);
  return {
    classes: classList(d, "classes_to_detect", DEFAULT_CLASSES, null),
    confidenceThreshold: num(d, "confidence_threshold", DEFAULT_CONFIDENCE, null, { min: 0, max: 1 }),
    motion: parseMotion(
      d,
      {
        minArea: DEFAULT_MIN_AREA,
        threshold: DEFAULT_MOTION_THRESHOLD,
        blurKernel: DEFAULT_BLUR_KERNEL,
        skipFrames: DEFAULT_SKIP_FRAMES,
        forceInterval: DEFAULT_FORCE_INTERVAL,
      },
      null
    ),
    detector: parseDetectorMode(d.detector),
    timeoutMs: num(d, "detection_timeout_ms", getDetectionTimeoutMs(), null, { min: 0 }),
    frame: parseFrame(d, DEFAULT_FRAME, null),
  };
}

function parseEmail(raw: Raw): EmailSettings | null {
  const e = section(raw, "email", null);
  if (!bool(e, "enabled", false, null)) return null;
  const required = (key: string): string => {
    const v = str(e, key, null);
    if (!v) throw new ConfigurationError(`"alerting.email.${key}" is required when email is enabled`);
    return v;
  };
  const smtpServer = required("smtp_server");
  const smtpPort = num(e, "smtp_port", 587, null, { min: 1, max: 65535, integer: true });
  return {
    smtpServer,
    smtpPort,
    secure: bool(e, "secure", smtpPort === 465, null),
    senderEmail: required("sender_email"),
    senderPassword: str(e, "sender_password", null) ?? "",
    recipientEmail: required("recipient_email"),
  };
}

export function parseAlerting(raw: Raw): AlertingConfig {
  const a = section(raw, "alerting", null);
  const voice = section(a, "voice", null);
  const log = section(a, "incident_log", null);
  return {
    cooldownSeconds: num(a, "cooldown_seconds", getCooldownSeconds(), null, { min: 0 }),
    saveDirectory: str(a, "save_directory", null) ?? getSaveDir(),
    voice: bool(voice, "enabled", false, null),
    incidentLog: bool(log, "enabled", true, null) ? str(log, "path", null) ?? "./alerts/incidents.jsonl" : null,
    email: parseEmail(a),
  };
}

/**
 * One camera entry → CameraConfig. Throws ConfigurationError naming the camera.
 */
export function validateCameraConfig(entry: unknown, defaults: DetectionDefaults, alerting: AlertingConfig): CameraConfig {
  if (!isRecord(entry)) throw new ConfigurationError("camera entry must be an object");
  const nameValue = entry.name;
  const name = typeof nameValue === "string" && nameValue.trim() !== "" ? nameValue.trim() : null;
  if (!name) throw new ConfigurationError('camera entry needs a "name"');
  const url = str(entry, "url", name);
  if (!url) throw new ConfigurationError('missing "url"', name);

  const linger = section(entry, "linger_detection", name);
  const roi = numberTuple(linger, "roi", 4, name);
  if (!roi) throw new ConfigurationError('"linger_detection.roi" is required', name);
  const [x1, y1, x2, y2] = roi;
  if (x2 <= x1 || y2 <= y1) throw new ConfigurationError('"roi" must be [x1, y1, x2, y2] with x2 > x1 and y2 > y1', name);

  return {
    name,
    url,
    classes: classList(entry, "classes_to_detect", defaults.classes, name),
    confidenceThreshold: num(entry, "confidence_threshold", defaults.confidenceThreshold, name, { min: 0, max: 1 }),
    roi: { x1, y1, x2, y2 },
    motion: parseMotion(entry, defaults.motion, name),
    tracking: {
      distanceThreshold: num(linger, "tracking_distance_threshold", DEFAULT_TRACKING_DISTANCE, name, { min: 0 }),
      maxMissingFrames: num(linger, "max_missing_frames", DEFAULT_MAX_MISSING, name, { min: 0, integer: true }),
      useIou: bool(linger, "use_iou", true, name),
    },
    lingerTimeSeconds: num(linger, "linger_time_seconds", DEFAULT_LINGER_SECONDS, name, { min: 0 }),
    cooldownSeconds: num(entry, "alert_cooldown_seconds", alerting.cooldownSeconds, name, { min: 0 }),
    frame: parseFrame(entry, defaults.frame, name),
  };
}

/**
 * Parsed JSON → MonitorConfig. Per-camera problems land in `rejected`.
 */
export function buildMonitorConfig(raw: unknown): MonitorConfig {
  if (!isRecord(raw)) throw new ConfigurationError("config root must be an object");
  const detection = parseDetectionDefaults(raw);
  const alerting = parseAlerting(raw);
  const reconnect = section(raw, "reconnect", null);
  const restart = section(raw, "restart", null);

  const camerasRaw = raw.cameras ?? [];
  if (!Array.isArray(camerasRaw)) throw new ConfigurationError('"cameras" must be a list');

  const cameras: CameraConfig[] = [];
  const rejected: ConfigurationError[] = [];
  const seen = new Set<string>();
  for (const entry of camerasRaw) {
    try {
      const camera = validateCameraConfig(entry, detection, alerting);
      if (seen.has(camera.name)) throw new ConfigurationError("duplicate camera name", camera.name);
      seen.add(camera.name);
      cameras.push(camera);
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      rejected.push(e);
    }
  }

  if (cameras.length === 0) {
    const reasons = rejected.map((e) => e.message).join("; ");
    throw new ConfigurationError(`no valid cameras configured${reasons ? ` (${reasons})` : ""}`);
  }

  return {
    cameras,
    rejected,
    detection,
    alerting,
    reconnect: {
      initialDelayMs: num(reconnect, "initial_delay_ms", 1000, null, { min: 0 }),
      maxDelayMs: num(reconnect, "max_delay_ms", 30000, null, { min: 0 }),
      stateGraceMs: num(reconnect, "state_grace_ms", 0, null, { min: 0 }),
    },
    restart: {
      initialDelayMs: num(restart, "initial_delay_ms", 2000, null, { min: 0 }),
      maxDelayMs: num(restart, "max_delay_ms", 60000, null, { min: 0 }),
      maxRestarts: num(restart, "max_restarts", Number.POSITIVE_INFINITY, null, { min: 0, integer: true }),
    },
    shutdownTimeoutMs: num(raw, "shutdown_timeout_ms", getShutdownTimeoutMs(), null, { min: 0 }),
  };
}

export async function loadMonitorConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<MonitorConfig> {
  const resolved = path.resolve(configPath);
  let text: string;
  try {
    text = await readFile(resolved, "utf-8");
  } catch (e) {
    throw new ConfigurationError(`cannot read config ${resolved}: ${errorMessage(e)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigurationError(`invalid JSON in ${resolved}: ${errorMessage(e)}`);
  }
  return buildMonitorConfig(raw);
}
