#!/usr/bin/env node
/**
 * linger-monitor: run every configured camera until SIGINT/SIGTERM.
 *
 * Usage: linger-monitor [--config ./monitor.config.json] [--dry-run] [--status-interval 60]
 */

import path from "path";
import { parseArgs } from "util";
import { CameraWorker } from "../camera-pipeline/camera-worker";
import type { Notifier } from "../camera-pipeline/collaborators";
import { ConfigurationError, errorMessage } from "../camera-pipeline/errors";
import { CameraSupervisor, type CameraStatus } from "../camera-pipeline/supervisor";
import { DEFAULT_CONFIG_PATH, loadMonitorConfig, type CameraConfig, type MonitorConfig } from "../config";
import { OpenAIVisionDetector } from "../detectors/openai-detector";
import { createDetectorProvider, type DetectorProvider } from "../detectors/serialized-detector";
import { FfmpegFrameSource } from "../frame-sources/ffmpeg-source";
import { EmailNotifier } from "../linger-alerts/email";
import { IncidentLogNotifier } from "../linger-alerts/incident-log";
import { NotificationManager } from "../linger-alerts/notification-manager";
import { VoiceAlertNotifier } from "../linger-alerts/voice";
import { OverlayRenderer } from "../overlay/renderer";
import { PngSnapshotStore } from "../overlay/snapshot";

export interface CliOptions {
  configPath: string;
  dryRun: boolean;
  statusIntervalSec: number;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      "dry-run": { type: "boolean" },
      "status-interval": { type: "string" },
    },
    strict: true,
  });
  const interval = Number(values["status-interval"] ?? "60");
  return {
    configPath: values.config ?? process.env.LINGER_CONFIG ?? DEFAULT_CONFIG_PATH,
    dryRun: values["dry-run"] ?? false,
    statusIntervalSec: Number.isFinite(interval) && interval >= 0 ? interval : 60,
  };
}

export function buildNotifier(config: MonitorConfig): NotificationManager {
  const notifiers: Notifier[] = [];
  if (config.alerting.voice) notifiers.push(new VoiceAlertNotifier());
  if (config.alerting.incidentLog) notifiers.push(new IncidentLogNotifier(path.resolve(config.alerting.incidentLog)));
  if (config.alerting.email) notifiers.push(new EmailNotifier(config.alerting.email));
  return new NotificationManager(notifiers);
}

export function buildSupervisor(config: MonitorConfig, detectors: DetectorProvider): CameraSupervisor {
  const notifier = buildNotifier(config);
  const renderer = new OverlayRenderer();
  const snapshots = new PngSnapshotStore(path.resolve(config.alerting.saveDirectory));

  return new CameraSupervisor({
    restart: config.restart,
    startStaggerMs: 200,
    createWorker: (settings) => {
      const camera = config.cameras.find((c) => c.name === settings.name);
      if (!camera) throw new ConfigurationError("camera is not in the loaded config", settings.name);
      return createCameraWorker(camera, config, detectors, { notifier, renderer, snapshots });
    },
  });
}

function createCameraWorker(
  camera: CameraConfig,
  config: MonitorConfig,
  detectors: DetectorProvider,
  sinks: { notifier: Notifier; renderer: OverlayRenderer; snapshots: PngSnapshotStore }
): CameraWorker {
  return new CameraWorker({
    camera,
    source: new FfmpegFrameSource({
      url: camera.url,
      width: camera.frame.width,
      height: camera.frame.height,
      fps: camera.frame.fps,
    }),
    detector: detectors.forCamera(camera.name),
    notifier: sinks.notifier,
    renderer: sinks.renderer,
    snapshots: sinks.snapshots,
    reconnect: config.reconnect,
    detectionTimeoutMs: config.detection.timeoutMs,
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  let config: MonitorConfig;
  try {
    options = parseCliArgs(argv);
    if (options.dryRun) process.env.DRY_RUN = "1";
    config = await loadMonitorConfig(options.configPath);
  } catch (e) {
    console.error("[Monitor] configuration error:", errorMessage(e));
    return 1;
  }

  for (const rejected of config.rejected) {
    console.error("[Monitor] camera skipped:", rejected.message);
  }

  let detectors: DetectorProvider;
  try {
    detectors = createDetectorProvider(config.detection.detector, () => new OpenAIVisionDetector());
    // build eagerly so a missing API key fails before any camera starts
    for (const camera of config.cameras) detectors.forCamera(camera.name);
  } catch (e) {
    console.error("[Monitor] detector unavailable:", errorMessage(e));
    return 1;
  }

  const supervisor = buildSupervisor(config, detectors);
  console.log(
    `[Monitor] starting ${config.cameras.length} camera(s), detector mode ${detectors.mode}, ` +
      `cooldown ${config.alerting.cooldownSeconds}s`
  );
  supervisor.start(config.cameras);

  const statusTimer =
    options.statusIntervalSec > 0
      ? setInterval(() => {
          for (const s of supervisor.status()) {
            console.log(
              `[Monitor] ${s.camera}: ${s.state.kind}${s.degraded ? " (degraded)" : ""} restarts=${s.restarts}`
            );
          }
        }, options.statusIntervalSec * 1000)
      : null;
  statusTimer?.unref();

  const stopped = new Promise<"signal">((resolve) => {
    const onSignal = (sig: NodeJS.Signals) => {
      console.log(`[Monitor] received ${sig}, shutting down`);
      resolve("signal");
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  });

  const outcome = await Promise.race([stopped, supervisor.wait().then(() => "finished" as const)]);
  if (statusTimer) clearInterval(statusTimer);

  if (outcome === "finished") {
    console.log("[Monitor] all cameras finished");
    return exitCodeFor(supervisor.status());
  }

  const result = await supervisor.shutdown(config.shutdownTimeoutMs);
  console.log(`[Monitor] stopped: ${result.stopped.join(", ") || "none"}`);
  if (result.abandoned.length > 0) {
    console.error(`[Monitor] abandoned: ${result.abandoned.join(", ")}`);
  }
  return exitCodeFor(supervisor.status());
}

/** 0 when every camera ended healthy, 1 when any is degraded. */
export function exitCodeFor(statuses: CameraStatus[]): number {
  const degraded = statuses.filter((s) => s.degraded).map((s) => s.camera);
  if (degraded.length === 0) return 0;
  console.error(`[Monitor] degraded: ${degraded.join(", ")}`);
  return 1;
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((e: unknown) => {
      console.error("[Monitor] fatal:", errorMessage(e));
      process.exit(1);
    });
}
