import { Logger } from '@nestjs/common';
import { z } from 'zod';
import {
  CuaError,
  CuaErrorCode,
  describeElementQuery,
  ElementError,
  ElementQuery,
  hasSelector,
  rectCenter,
} from '@cua/shared';
import { encodeScreenshot } from '../coordinate-system';
import { defineTool, failure, success } from './tool.helpers';

const logger = new Logger('ScreenTools');

const regionSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

export const screenshotSchema = z.object({
  display_index: z.number().int().min(0).optional(),
  region: regionSchema.optional(),
});

export const screenshotTool = defineTool({
  name: 'screenshot',
  description:
    'Captures the screen (or a region of it) and returns it as a JPEG image. Take a screenshot before acting and after any action that changes the screen. Coordinates you later pass to click, move, drag or scroll may be pixels of this image or normalized 0-1000 values.',
  input_schema: {
    type: 'object',
    properties: {
      display_index: {
        type: 'integer',
        description: 'Display to capture (0 is the primary display)',
        default: 0,
      },
      region: {
        type: 'object',
        description: 'Optional region to capture, in logical screen units',
        properties: {
          x: { type: 'integer' },
          y: { type: 'integer' },
          width: { type: 'integer' },
          height: { type: 'integer' },
        },
        required: ['x', 'y', 'width', 'height'],
      },
    },
  },
  schema: screenshotSchema,
  target: (args) =>
    args.region
      ? `${args.region.width}x${args.region.height}+${args.region.x}+${args.region.y}`
      : '',
  async execute(args, context) {
    const displayIndex = args.display_index ?? context.screenIndex;
    const { region } = args;

    if (region && (region.width <= 0 || region.height <= 0)) {
      return failure(
        new CuaError(CuaErrorCode.InvalidRect).message,
        'Region width and height must be positive',
        { code: CuaErrorCode.InvalidRect },
      );
    }

    const frame = await context.backend.capture.capture(displayIndex, region);
    const encoded = await encodeScreenshot(frame, context.screenshot);

    const area = region ?? frame.display.bounds;
    const effectiveScale =
      frame.width / encoded.width / frame.display.scaleFactor;

    context.coordinates.update({
      area,
      imageSize: { width: encoded.width, height: encoded.height },
      effectiveScale,
    });
    context.memory.setKeyFact(
      'screen',
      `${frame.display.bounds.width}x${frame.display.bounds.height} logical`,
    );

    logger.log(
      `[screenshot] ${frame.width}x${frame.height} -> ${encoded.width}x${encoded.height}, ${(encoded.byteLength / 1024).toFixed(1)} KB, scale=${effectiveScale.toFixed(3)}`,
    );

    return success(`Captured ${encoded.width}x${encoded.height} screenshot`, {
      image_base64: encoded.base64,
      width: encoded.width,
      height: encoded.height,
      scale_factor: effectiveScale,
      coordinate_info: `Image is ${encoded.width}x${encoded.height} pixels. Use pixel coordinates from this image (x 0-${encoded.width - 1}, y 0-${encoded.height - 1}) or normalized 0-1000 coordinates.`,
    });
  },
});

export const screenInfoTool = defineTool({
  name: 'screen_info',
  description:
    'Lists the connected displays with their logical bounds and scale factors.',
  input_schema: { type: 'object', properties: {} },
  schema: z.object({}),
  target: () => '',
  async execute(_args, context) {
    const displays = await context.backend.capture.displays();
    return success(`Found ${displays.length} display(s)`, {
      displays: displays.map((display) => ({
        index: display.index,
        x: display.bounds.x,
        y: display.bounds.y,
        width: display.bounds.width,
        height: display.bounds.height,
        scale_factor: display.scaleFactor,
        is_primary: display.isPrimary,
      })),
    });
  },
});

export const findElementSchema = z.object({
  role: z.string().optional(),
  name: z.string().optional(),
  name_contains: z.string().optional(),
  title: z.string().optional(),
  max_results: z.number().int().optional(),
});

const DEFAULT_MAX_RESULTS = 10;

export const findElementTool = defineTool({
  name: 'find_element',
  description:
    'Finds UI elements of the focused application through the accessibility tree. Search by role (button, textfield, checkbox, link, window), exact name, name substring or exact title. Returns element bounds and center points in logical screen coordinates. Element ids are only valid for this call.',
  input_schema: {
    type: 'object',
    properties: {
      role: { type: 'string', description: 'Element role, e.g. button' },
      name: { type: 'string', description: 'Exact element name or label' },
      name_contains: {
        type: 'string',
        description: 'Case-insensitive substring of the element name',
      },
      title: { type: 'string', description: 'Exact element title' },
      max_results: {
        type: 'integer',
        description: 'Maximum number of elements to return',
        default: DEFAULT_MAX_RESULTS,
      },
    },
  },
  schema: findElementSchema,
  target: (args) => describeElementQuery(toElementQuery(args)),
  async execute(args, context) {
    const query = toElementQuery(args);
    if (!hasSelector(query)) {
      return failure(
        'at least one search criteria is required (role, name, name_contains, or title)',
        'Pass a role, name, name_contains or title',
      );
    }

    const maxResults =
      args.max_results && args.max_results > 0
        ? args.max_results
        : DEFAULT_MAX_RESULTS;

    let elements;
    try {
      elements = await context.backend.accessibility.findElements(
        query,
        maxResults,
      );
    } catch (error) {
      if (error instanceof CuaError && error.code === CuaErrorCode.NotSupported) {
        return failure(error.message, 'Take a screenshot and locate the element visually', {
          code: error.code,
        });
      }
      throw error;
    }

    if (elements.length === 0) {
      const notFound = new ElementError(describeElementQuery(query));
      return failure(
        notFound.message,
        'Take a screenshot and locate the element visually, or relax the search',
        { code: notFound.code, count: 0 },
      );
    }

    const found = elements.slice(0, maxResults).map((element) => {
      const center = rectCenter(element.bounds);
      return {
        id: element.id,
        role: element.role,
        name: element.name,
        title: element.title,
        value: element.value,
        bounds: { ...element.bounds },
        center_x: center.x,
        center_y: center.y,
        enabled: element.enabled,
        focused: element.focused,
      };
    });

    return success(`Found ${found.length} element(s)`, {
      count: found.length,
      elements: found,
    });
  },
});

function toElementQuery(args: z.infer<typeof findElementSchema>): ElementQuery {
  return {
    role: args.role || undefined,
    name: args.name || undefined,
    nameContains: args.name_contains || undefined,
    title: args.title || undefined,
  };
}
