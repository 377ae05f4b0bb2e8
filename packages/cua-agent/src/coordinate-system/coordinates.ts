import { Point, Rect, Size } from '@cua/shared';

/** Upper bound of the normalized coordinate space on each axis. */
export const NORMALIZED_MAX = 1000;

/** Logical size assumed when no screenshot has been taken yet. */
export const FALLBACK_SCREEN_SIZE: Size = { width: 1920, height: 1080 };

export type CoordinateMode = 'normalized' | 'image';

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Decides whether a model-emitted point is normalized (0-1000) or refers to
 * pixels of the last screenshot. Rules are applied in order:
 *
 * 1. either axis above 1000 means image pixels
 * 2. either axis outside the image means normalized
 * 3. an image wider or taller than 1000 with both axes below 1000 means normalized
 * 4. anything else is image pixels
 */
export function classifyCoordinates(
  x: number,
  y: number,
  imageSize: Size,
): CoordinateMode {
  if (x > NORMALIZED_MAX || y > NORMALIZED_MAX) {
    return 'image';
  }
  if (x >= imageSize.width || y >= imageSize.height) {
    return 'normalized';
  }
  if (
    (imageSize.width > NORMALIZED_MAX || imageSize.height > NORMALIZED_MAX) &&
    x < NORMALIZED_MAX &&
    y < NORMALIZED_MAX
  ) {
    return 'normalized';
  }
  return 'image';
}

/**
 * Maps a normalized point onto a screen rectangle, clamped to the last
 * addressable pixel.
 */
export function denormalize(norm: Point, screen: Rect): Point {
  return {
    x:
      screen.x +
      clamp(
        Math.round((norm.x / NORMALIZED_MAX) * screen.width),
        0,
        screen.width - 1,
      ),
    y:
      screen.y +
      clamp(
        Math.round((norm.y / NORMALIZED_MAX) * screen.height),
        0,
        screen.height - 1,
      ),
  };
}

export function normalize(pixel: Point, screen: Rect): Point {
  return {
    x: Math.floor(((pixel.x - screen.x) * NORMALIZED_MAX) / screen.width),
    y: Math.floor(((pixel.y - screen.y) * NORMALIZED_MAX) / screen.height),
  };
}

export function logicalToPhysical(point: Point, scaleFactor: number): Point {
  return { x: point.x * scaleFactor, y: point.y * scaleFactor };
}

export function physicalToLogical(point: Point, scaleFactor: number): Point {
  return { x: point.x / scaleFactor, y: point.y / scaleFactor };
}

/**
 * Target size for a screenshot whose longest side must not exceed
 * `maxDimension`. Frames already small enough keep their size.
 */
export function resizedDimensions(
  width: number,
  height: number,
  maxDimension: number,
): Size {
  if (width <= maxDimension && height <= maxDimension) {
    return { width, height };
  }
  if (width > height) {
    return {
      width: maxDimension,
      height: Math.max(1, Math.floor((height * maxDimension) / width)),
    };
  }
  return {
    width: Math.max(1, Math.floor((width * maxDimension) / height)),
    height: maxDimension,
  };
}
