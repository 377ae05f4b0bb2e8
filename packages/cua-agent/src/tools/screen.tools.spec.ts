import { UIElement } from '@cua/shared';
import { FakeDesktopBackend } from '../testing/fake-desktop-backend';
import { createTestToolContext, TestToolContext } from '../testing/tool-context';
import { findElementTool, screenInfoTool, screenshotTool } from './screen.tools';
import { clickTool } from './input.tools';
import { AgentTool, ToolContext, ToolOutput } from './tool.types';

async function run(
  tool: AgentTool,
  input: Record<string, unknown>,
  context: ToolContext,
): Promise<ToolOutput> {
  const call = tool.prepare(input);
  if (!call.valid) {
    return call.output;
  }
  return call.run(context);
}

const okButton: UIElement = {
  id: 'e1',
  role: 'AXButton',
  name: 'OK',
  title: '',
  value: '',
  bounds: { x: 10, y: 20, width: 100, height: 40 },
  enabled: true,
  focused: false,
};

const searchField: UIElement = {
  id: 'e2',
  role: 'AXTextField',
  name: 'Search',
  title: 'Search',
  value: '',
  bounds: { x: 200, y: 10, width: 300, height: 24 },
  enabled: true,
  focused: true,
};

describe('screenshot tool', () => {
  let context: TestToolContext;

  beforeEach(() => {
    context = createTestToolContext();
  });

  it('downscales a Retina frame and caches the effective scale', async () => {
    const output = await run(screenshotTool, {}, context);

    expect(output).toMatchObject({
      success: true,
      width: 1280,
      height: 831,
      scale_factor: 1.18125,
    });
    expect(typeof output.image_base64).toBe('string');
    expect(context.coordinates.imageSize).toEqual({ width: 1280, height: 831 });
    expect(context.coordinates.effectiveScale).toBe(1.18125);
    expect(context.memory.getKeyFact('screen')).toBe('1512x982 logical');
  });

  it('interprets later clicks against the captured geometry', async () => {
    await run(screenshotTool, {}, context);

    const normalized = await run(clickTool, { x: 500, y: 500 }, context);
    expect(normalized).toMatchObject({ x: 756, y: 491, coordinate_mode: 'normalized' });

    const pixels = await run(clickTool, { x: 1500, y: 500 }, context);
    expect(pixels).toMatchObject({ x: 1511, y: 591, coordinate_mode: 'image' });
  });

  it('offsets coordinates by the captured region', async () => {
    const output = await run(
      screenshotTool,
      { region: { x: 100, y: 50, width: 400, height: 300 } },
      context,
    );
    expect(output).toMatchObject({ width: 800, height: 600, scale_factor: 0.5 });

    const click = await run(clickTool, { x: 100, y: 100 }, context);
    expect(click).toMatchObject({ x: 150, y: 100, coordinate_mode: 'image' });
  });

  it('rejects a region with no area', async () => {
    const output = await run(
      screenshotTool,
      { region: { x: 0, y: 0, width: 0, height: 10 } },
      context,
    );

    expect(output).toEqual({
      success: false,
      error: 'invalid capture rectangle',
      suggestion: 'Region width and height must be positive',
      code: 'invalid_rect',
    });
    expect(context.backend.capture.captureCount).toBe(0);
  });

  it('reports the target region', () => {
    const call = screenshotTool.prepare({
      region: { x: 5, y: 6, width: 70, height: 80 },
    });
    expect(call.target).toBe('70x80+5+6');
  });
});

describe('screen_info tool', () => {
  it('lists displays', async () => {
    const output = await run(screenInfoTool, {}, createTestToolContext());

    expect(output).toEqual({
      success: true,
      message: 'Found 1 display(s)',
      displays: [
        {
          index: 0,
          x: 0,
          y: 0,
          width: 1512,
          height: 982,
          scale_factor: 2,
          is_primary: true,
        },
      ],
    });
  });
});

describe('find_element tool', () => {
  let backend: FakeDesktopBackend;
  let context: TestToolContext;

  beforeEach(() => {
    backend = new FakeDesktopBackend({ elements: [okButton, searchField] });
    context = createTestToolContext({ backend });
  });

  it('requires at least one selector', async () => {
    const output = await run(findElementTool, {}, context);

    expect(output.success).toBe(false);
    expect(output.error).toBe(
      'at least one search criteria is required (role, name, name_contains, or title)',
    );
    expect(backend.accessibility.queries).toHaveLength(0);
  });

  it('returns matches with their centers', async () => {
    const output = await run(findElementTool, { role: 'button' }, context);

    expect(output).toMatchObject({ success: true, count: 1 });
    expect(output.elements).toEqual([
      {
        id: 'e1',
        role: 'AXButton',
        name: 'OK',
        title: '',
        value: '',
        bounds: { x: 10, y: 20, width: 100, height: 40 },
        center_x: 60,
        center_y: 40,
        enabled: true,
        focused: false,
      },
    ]);
  });

  it('maps snake_case selectors onto the query', async () => {
    await run(findElementTool, { name_contains: 'sea', max_results: 3 }, context);
    expect(backend.accessibility.queries).toEqual([
      { role: undefined, name: undefined, nameContains: 'sea', title: undefined },
    ]);
  });

  it('reports zero matches as element not found', async () => {
    const output = await run(findElementTool, { name: 'Cancel' }, context);

    expect(output).toEqual({
      success: false,
      error: 'element not found: name=Cancel',
      suggestion:
        'Take a screenshot and locate the element visually, or relax the search',
      code: 'element_not_found',
      count: 0,
    });
  });

  it('falls back to a screenshot suggestion where unsupported', async () => {
    backend.accessibility.supported = false;

    const output = await run(findElementTool, { role: 'button' }, context);

    expect(output).toEqual({
      success: false,
      error: 'accessibility lookup is only available on macOS',
      suggestion: 'Take a screenshot and locate the element visually',
      code: 'not_supported',
    });
  });

  it('describes the query as its target', () => {
    expect(findElementTool.prepare({ role: 'button', title: 'OK' }).target).toBe(
      'role=button, title=OK',
    );
  });
});
