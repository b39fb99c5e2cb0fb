/**
 * OpenAI vision detector: frame → PNG data URL → JSON bounding boxes.
 *
 * Env: OPENAI_API_KEY, LINGER_DETECTOR_MODEL (gpt-4o-mini), LINGER_DETECTOR_MAX_TOKENS (1000).
 * Never logs the API key. Transport or parse failures raise DetectionError.
 */

import OpenAI from "openai";
import type { Detector } from "../camera-pipeline/collaborators";
import { DetectionError, errorMessage } from "../camera-pipeline/errors";
import type { Detection, Frame } from "../camera-pipeline/types";
import { toPngDataUrl } from "../overlay/png";

const DEFAULT_MODEL = "gpt-4o-mini";
const DEFAULT_MAX_TOKENS = 1000;

function getModel(): string {
  const v = process.env.LINGER_DETECTOR_MODEL;
  return v && v.length > 0 ? v : DEFAULT_MODEL;
}

function getMaxTokens(): number {
  const v = process.env.LINGER_DETECTOR_MAX_TOKENS;
  if (v === undefined || v === "") return DEFAULT_MAX_TOKENS;
  const n = Number(v);
  return Number.isFinite(n) && n >= 50 ? Math.floor(n) : DEFAULT_MAX_TOKENS;
}

export const DETECTOR_SYSTEM_PROMPT =
  "You are an object detector. Reply with JSON only, no prose. " +
  'Schema: {"detections":[{"label":string,"confidence":number,"box":[x1,y1,x2,y2]}]}. ' +
  "Coordinates are integer pixels of the supplied image, origin top-left. " +
  "Confidence is between 0 and 1. Return an empty list when nothing matches.";

export function buildDetectorPrompt(width: number, height: number, classes: ReadonlySet<string>): string {
  const wanted = classes.size > 0 ? Array.from(classes).sort().join(", ") : "any object";
  return `Image size: ${width}x${height}. Detect: ${wanted}. Use lowercase labels.`;
}

/** (system, user text, image data URL) → raw model text. */
export type VisionCompletion = (
  system: string,
  prompt: string,
  imageUrl: string,
  signal?: AbortSignal
) => Promise<string | null>;

export function openAIVisionCompletion(client: OpenAI, model: string = getModel()): VisionCompletion {
  const maxTokens = getMaxTokens();
  return async (system, prompt, imageUrl, signal) => {
    const response = await client.chat.completions.create(
      {
        model,
        temperature: 0,
        seed: 0,
        max_tokens: maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: system },
          {
            role: "user",
            content: [
              { type: "text", text: prompt },
              { type: "image_url", image_url: { url: imageUrl } },
            ],
          },
        ],
      },
      { signal }
    );
    return response.choices[0]?.message?.content ?? null;
  };
}

interface RawDetection {
  label: string;
  confidence: number;
  box: [number, number, number, number];
}

function isRawDetection(v: unknown): v is RawDetection {
  if (!v || typeof v !== "object") return false;
  if (!("label" in v) || !("confidence" in v) || !("box" in v)) return false;
  return (
    typeof v.label === "string" &&
    typeof v.confidence === "number" &&
    Array.isArray(v.box) &&
    v.box.length === 4 &&
    v.box.every((n: unknown) => typeof n === "number" && Number.isFinite(n))
  );
}

function extractJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const match = text.match(/```(?:json)?\s*({[\s\S]*?})\s*```/);
    if (match) return JSON.parse(match[1]);
    throw new Error("response is not JSON");
  }
}

/**
 * Parse the model reply into detections clamped to the frame and filtered by
 * class and confidence. Entries that fail validation are dropped.
 */
export function parseDetections(
  text: string,
  frame: Pick<Frame, "width" | "height">,
  allowedClasses: ReadonlySet<string>,
  confidenceThreshold: number
): Detection[] {
  const parsed = extractJson(text);
  if (!parsed || typeof parsed !== "object" || !("detections" in parsed)) {
    throw new Error('missing "detections"');
  }
  const list = parsed.detections;
  if (!Array.isArray(list)) throw new Error('"detections" is not an array');

  const out: Detection[] = [];
  for (const item of list) {
    if (!isRawDetection(item)) continue;
    const label = item.label.trim().toLowerCase();
    if (allowedClasses.size > 0 && !allowedClasses.has(label)) continue;
    const confidence = Math.min(1, Math.max(0, item.confidence));
    if (confidence < confidenceThreshold) continue;

    const [ax, ay, bx, by] = item.box;
    const x1 = clamp(Math.min(ax, bx), 0, frame.width);
    const y1 = clamp(Math.min(ay, by), 0, frame.height);
    const x2 = clamp(Math.max(ax, bx), 0, frame.width);
    const y2 = clamp(Math.max(ay, by), 0, frame.height);
    if (x2 <= x1 || y2 <= y1) continue;

    out.push({ box: { x1, y1, x2, y2 }, label, confidence });
  }
  return out;
}

export class OpenAIVisionDetector implements Detector {
  private readonly complete: VisionCompletion;

  constructor(complete?: VisionCompletion) {
    if (complete) {
      this.complete = complete;
      return;
    }
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY environment variable is not set");
    }
    this.complete = openAIVisionCompletion(new OpenAI({ apiKey }));
  }

  async detect(
    frame: Frame,
    allowedClasses: ReadonlySet<string>,
    confidenceThreshold: number,
    signal?: AbortSignal
  ): Promise<Detection[]> {
    let text: string | null;
    try {
      text = await this.complete(
        DETECTOR_SYSTEM_PROMPT,
        buildDetectorPrompt(frame.width, frame.height, allowedClasses),
        toPngDataUrl(frame),
        signal
      );
    } catch (e) {
      throw new DetectionError(`vision request failed: ${errorMessage(e)}`, { cause: e });
    }
    if (!text) {
      throw new DetectionError("vision model returned an empty reply");
    }
    try {
      return parseDetections(text, frame, allowedClasses, confidenceThreshold);
    } catch (e) {
      throw new DetectionError(`unparseable detector reply: ${errorMessage(e)}`, { cause: e });
    }
  }
}

function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}
