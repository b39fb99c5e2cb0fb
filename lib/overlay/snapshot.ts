/**
 * Alert snapshots: annotated frame saved as PNG under <dir>/<camera>/.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "path";
import type { SnapshotStore } from "../camera-pipeline/collaborators";
import type { Frame } from "../camera-pipeline/types";
import { encodePng } from "./png";

function safeCameraName(camera: string): string {
  return camera.replace(/[^a-zA-Z0-9-_]/g, "_").slice(0, 24);
}

export function snapshotFileName(camera: string, trackId: number, timestamp: number): string {
  const ts = new Date(timestamp).toISOString().replace(/[:.]/g, "-").slice(0, 23);
  return `${ts}_${safeCameraName(camera)}_linger_${trackId}.png`;
}

export class PngSnapshotStore implements SnapshotStore {
  constructor(private readonly baseDir: string) {}

  pathFor(camera: string, trackId: number, timestamp: number): string {
    return path.join(this.baseDir, safeCameraName(camera), snapshotFileName(camera, trackId, timestamp));
  }

  async save(frame: Frame, filePath: string): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, encodePng(frame));
  }
}
