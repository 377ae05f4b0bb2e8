import { CoordinateState } from '../coordinate-system';
import { TaskMemory } from '../memory';
import { Escalation, ToolContext } from '../tools/tool.types';
import { FakeDesktopBackend } from './fake-desktop-backend';

export interface TestToolContext extends ToolContext {
  backend: FakeDesktopBackend;
  escalations: Escalation[];
}

export function createTestToolContext(
  options: { backend?: FakeDesktopBackend; signal?: AbortSignal } = {},
): TestToolContext {
  const escalations: Escalation[] = [];
  return {
    backend: options.backend ?? new FakeDesktopBackend(),
    coordinates: new CoordinateState(),
    memory: new TaskMemory('test task'),
    screenIndex: 0,
    screenshot: { maxDimension: 1280, quality: 60 },
    signal: options.signal ?? new AbortController().signal,
    escalations,
    escalate(outcome) {
      escalations.push(outcome);
    },
  };
}
