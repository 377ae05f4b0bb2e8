import { Logger } from '@nestjs/common';
import { Point, Rect, Size } from '@cua/shared';
import {
  classifyCoordinates,
  clamp,
  CoordinateMode,
  denormalize,
  FALLBACK_SCREEN_SIZE,
} from './coordinates';

export interface ResolvedPoint extends Point {
  mode: CoordinateMode;
}

export interface ScreenshotGeometry {
  /** Captured area in logical units. */
  area: Rect;
  /** Pixel size of the image the model received. */
  imageSize: Size;
  /** Logical units per image pixel. */
  effectiveScale: number;
}

/**
 * Geometry of the most recent screenshot, owned by one agent and read by
 * every coordinate-consuming tool.
 */
export class CoordinateState {
  private readonly logger = new Logger(CoordinateState.name);
  private geometry: ScreenshotGeometry | null = null;

  update(geometry: ScreenshotGeometry): void {
    this.geometry = {
      area: { ...geometry.area },
      imageSize: { ...geometry.imageSize },
      effectiveScale: geometry.effectiveScale,
    };
  }

  reset(): void {
    this.geometry = null;
  }

  get logicalScreenSize(): Size {
    if (!this.geometry) {
      return { ...FALLBACK_SCREEN_SIZE };
    }
    return { width: this.geometry.area.width, height: this.geometry.area.height };
  }

  get imageSize(): Size | null {
    return this.geometry ? { ...this.geometry.imageSize } : null;
  }

  get effectiveScale(): number {
    return this.geometry?.effectiveScale ?? 1;
  }

  /**
   * Converts a model-emitted point into a logical input coordinate. The
   * result always lies inside the last captured area.
   */
  resolve(x: number, y: number): ResolvedPoint {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new RangeError(`coordinates must be finite numbers, got (${x}, ${y})`);
    }

    const area: Rect = this.geometry
      ? this.geometry.area
      : { x: 0, y: 0, ...FALLBACK_SCREEN_SIZE };
    const imageSize = this.geometry?.imageSize ?? { width: 0, height: 0 };
    const mode = classifyCoordinates(x, y, imageSize);

    let resolved: Point;
    if (mode === 'normalized') {
      resolved = denormalize({ x, y }, area);
    } else {
      resolved = {
        x:
          area.x +
          clamp(Math.round(x * this.effectiveScale), 0, area.width - 1),
        y:
          area.y +
          clamp(Math.round(y * this.effectiveScale), 0, area.height - 1),
      };
    }

    this.logger.debug(
      `Resolved (${x}, ${y}) as ${mode} -> (${resolved.x}, ${resolved.y})`,
    );
    return { ...resolved, mode };
  }
}
