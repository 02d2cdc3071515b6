/**
 * Dual-Circle Mask
 *
 * Generates the vignette mask composited over dual-fisheye frames:
 * two filled, hard-edged circles (one per eye) on a black field.
 * Geometry depends on the frame dimensions only.
 */

import { PNG } from 'pngjs';
import { InvalidDimensionsError } from '@eac-fisheye/core';

export const MASK_RADIUS_RATIO = 0.45;
export const MASK_RADIUS_PADDING = 20; // pixels past the fisheye image circle

export const MASK_INSIDE = 255;
export const MASK_OUTSIDE = 0;

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface MaskSpec {
  readonly width: number;
  readonly height: number;
  readonly radius: number;
  readonly left: Point;
  readonly right: Point;
}

/**
 * Single-channel 8-bit raster, row-major
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly channels: 1;
  readonly data: Uint8Array;
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(width, height);
  }
}

/**
 * Circle geometry for a frame of the given size
 */
export function deriveMaskSpec(width: number, height: number): MaskSpec {
  assertDimensions(width, height);

  return Object.freeze({
    width,
    height,
    radius: Math.round(height * MASK_RADIUS_RATIO) + MASK_RADIUS_PADDING,
    left: Object.freeze({ x: width / 4, y: height / 2 }),
    right: Object.freeze({ x: (width * 3) / 4, y: height / 2 }),
  });
}

function fillCircle(raster: Uint8Array, spec: MaskSpec, center: Point): void {
  const r2 = spec.radius * spec.radius;
  const minY = Math.max(0, Math.floor(center.y - spec.radius));
  const maxY = Math.min(spec.height - 1, Math.ceil(center.y + spec.radius));
  const minX = Math.max(0, Math.floor(center.x - spec.radius));
  const maxX = Math.min(spec.width - 1, Math.ceil(center.x + spec.radius));

  for (let y = minY; y <= maxY; y++) {
    const dy = y - center.y;
    const row = y * spec.width;
    for (let x = minX; x <= maxX; x++) {
      const dx = x - center.x;
      if (dx * dx + dy * dy <= r2) {
        raster[row + x] = MASK_INSIDE;
      }
    }
  }
}

/**
 * Rasterize the mask: 255 inside either circle, 0 elsewhere
 */
export function generateMask(width: number, height: number): RasterImage {
  const spec = deriveMaskSpec(width, height);
  const data = new Uint8Array(width * height).fill(MASK_OUTSIDE);

  fillCircle(data, spec, spec.left);
  fillCircle(data, spec, spec.right);

  return { width, height, channels: 1, data };
}

export function maskValueAt(raster: RasterImage, x: number, y: number): number {
  if (x < 0 || y < 0 || x >= raster.width || y >= raster.height) {
    return MASK_OUTSIDE;
  }
  return raster.data[y * raster.width + x] ?? MASK_OUTSIDE;
}

/**
 * Encode as an 8-bit greyscale PNG
 */
export function encodeMaskPng(raster: RasterImage): Buffer {
  assertDimensions(raster.width, raster.height);

  const png = new PNG({ width: raster.width, height: raster.height });
  for (let i = 0; i < raster.data.length; i++) {
    const value = raster.data[i] ?? MASK_OUTSIDE;
    const offset = i * 4;
    png.data[offset] = value;
    png.data[offset + 1] = value;
    png.data[offset + 2] = value;
    png.data[offset + 3] = 255;
  }

  return PNG.sync.write(png, { colorType: 0 });
}
