/**
 * Pixel helpers for motion gating: grayscale, box blur, abs-diff threshold,
 * largest 8-connected region.
 */

import type { Frame } from "./types";

export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Luma (BT.601 integer weights). Alpha is ignored. */
export function toGray(frame: Frame): GrayImage {
  const { width, height, channels, data } = frame;
  const n = width * height;
  if (channels === 1) {
    return { width, height, data: data.subarray(0, n) };
  }
  const out = new Uint8Array(n);
  for (let i = 0, p = 0; i < n; i++, p += channels) {
    out[i] = (data[p] * 77 + data[p + 1] * 150 + data[p + 2] * 29) >> 8;
  }
  return { width, height, data: out };
}

/**
 * Separable box blur; kernel sizes are forced odd, edges clamp.
 */
export function boxBlur(img: GrayImage, kernelW: number, kernelH: number): GrayImage {
  const rx = Math.max(0, Math.floor(kernelW / 2));
  const ry = Math.max(0, Math.floor(kernelH / 2));
  if (rx === 0 && ry === 0) return img;

  const { width, height } = img;
  const tmp = new Uint8Array(width * height);
  const out = new Uint8Array(width * height);

  const wx = 2 * rx + 1;
  for (let y = 0; y < height; y++) {
    const row = y * width;
    let sum = 0;
    for (let k = -rx; k <= rx; k++) {
      sum += img.data[row + clamp(k, 0, width - 1)];
    }
    for (let x = 0; x < width; x++) {
      tmp[row + x] = Math.round(sum / wx);
      const outgoing = clamp(x - rx, 0, width - 1);
      const incoming = clamp(x + rx + 1, 0, width - 1);
      sum += img.data[row + incoming] - img.data[row + outgoing];
    }
  }

  const wy = 2 * ry + 1;
  for (let x = 0; x < width; x++) {
    let sum = 0;
    for (let k = -ry; k <= ry; k++) {
      sum += tmp[clamp(k, 0, height - 1) * width + x];
    }
    for (let y = 0; y < height; y++) {
      out[y * width + x] = Math.round(sum / wy);
      const outgoing = clamp(y - ry, 0, height - 1);
      const incoming = clamp(y + ry + 1, 0, height - 1);
      sum += tmp[incoming * width + x] - tmp[outgoing * width + x];
    }
  }

  return { width, height, data: out };
}

/** 1 where |a - b| > threshold, else 0. */
export function diffMask(a: GrayImage, b: GrayImage, threshold: number): Uint8Array {
  const n = a.width * a.height;
  const mask = new Uint8Array(n);
  for (let i = 0; i < n; i++) {
    mask[i] = Math.abs(a.data[i] - b.data[i]) > threshold ? 1 : 0;
  }
  return mask;
}

/**
 * Pixel count of the largest 8-connected region of set pixels.
 */
export function largestRegionArea(mask: Uint8Array, width: number, height: number): number {
  const seen = new Uint8Array(mask.length);
  const stack: number[] = [];
  let best = 0;

  for (let start = 0; start < mask.length; start++) {
    if (mask[start] === 0 || seen[start] === 1) continue;
    seen[start] = 1;
    stack.push(start);
    let area = 0;

    while (stack.length > 0) {
      const idx = stack.pop();
      if (idx === undefined) break;
      area++;
      const x = idx % width;
      const y = (idx - x) / width;
      for (let dy = -1; dy <= 1; dy++) {
        const ny = y + dy;
        if (ny < 0 || ny >= height) continue;
        for (let dx = -1; dx <= 1; dx++) {
          const nx = x + dx;
          if ((dx === 0 && dy === 0) || nx < 0 || nx >= width) continue;
          const nIdx = ny * width + nx;
          if (mask[nIdx] === 1 && seen[nIdx] === 0) {
            seen[nIdx] = 1;
            stack.push(nIdx);
          }
        }
      }
    }

    if (area > best) best = area;
  }

  return best;
}

function clamp(v: number, lo: number, hi: number): number {
  return v < lo ? lo : v > hi ? hi : v;
}
