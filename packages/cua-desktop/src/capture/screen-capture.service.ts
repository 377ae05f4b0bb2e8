import { Injectable, Logger } from '@nestjs/common';
import { Image, Region, screen } from '@nut-tree-fork/nut-js';
import {
  CaptureBackend,
  CapturedFrame,
  CuaError,
  CuaErrorCode,
  Display,
  isMacOS,
  PermissionError,
  Rect,
} from '@cua/shared';

const PROBE_SIZE = 10;

/**
 * Framebuffer capture through nut-js. nut-js only addresses the primary
 * display, so any other index is rejected.
 */
@Injectable()
export class ScreenCaptureService implements CaptureBackend {
  private readonly logger = new Logger(ScreenCaptureService.name);
  private cachedScaleFactor = 0;

  async displays(): Promise<Display[]> {
    const [width, height] = await Promise.all([screen.width(), screen.height()]);
    const scaleFactor = await this.scaleFactor();

    return [
      {
        index: 0,
        bounds: { x: 0, y: 0, width, height },
        scaleFactor,
        isPrimary: true,
      },
    ];
  }

  async capture(displayIndex: number, region?: Rect): Promise<CapturedFrame> {
    const displays = await this.displays();
    const display = displays.find((candidate) => candidate.index === displayIndex);
    if (!display) {
      throw new CuaError(
        CuaErrorCode.InvalidDisplay,
        `invalid display index ${displayIndex} (${displays.length} available)`,
      );
    }

    if (region && (region.width <= 0 || region.height <= 0)) {
      throw new CuaError(CuaErrorCode.InvalidRect);
    }

    this.logger.debug(
      region
        ? `Capturing region x=${region.x} y=${region.y} w=${region.width} h=${region.height}`
        : `Capturing display ${displayIndex}`,
    );

    let image: Image;
    try {
      const grabbed = region
        ? await screen.grabRegion(
            new Region(region.x, region.y, region.width, region.height),
          )
        : await screen.grab();
      image = await grabbed.toRGB();
    } catch (error) {
      throw this.captureError(error);
    }

    if (image.width <= 0 || image.height <= 0) {
      throw new CuaError(CuaErrorCode.CaptureFailed, 'screen capture returned an empty image');
    }

    return {
      data: image.data,
      width: image.width,
      height: image.height,
      channels: image.channels === 3 ? 3 : 4,
      display,
      region,
    };
  }

  /**
   * Physical pixels per logical unit, measured once by grabbing a small
   * probe region and comparing its pixel width with the requested width.
   */
  private async scaleFactor(): Promise<number> {
    if (this.cachedScaleFactor > 0) {
      return this.cachedScaleFactor;
    }

    try {
      const probe = await screen.grabRegion(
        new Region(0, 0, PROBE_SIZE, PROBE_SIZE),
      );
      this.cachedScaleFactor =
        probe.width > 0 ? probe.width / PROBE_SIZE : 1;
    } catch (error) {
      this.logger.warn(
        `Could not measure display scale factor, assuming 1: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.cachedScaleFactor = 1;
    }

    return this.cachedScaleFactor;
  }

  private captureError(error: unknown): Error {
    const message = error instanceof Error ? error.message : String(error);
    if (isMacOS() && /permission|not authori[sz]ed|denied/i.test(message)) {
      return new PermissionError('screen recording', { cause: error });
    }
    return new CuaError(CuaErrorCode.CaptureFailed, `screen capture failed: ${message}`, {
      cause: error,
    });
  }
}
