import { ActionResult } from './memory.types';
import { Summarizer } from './summarizer';

function createAction(overrides: Partial<ActionResult> = {}): ActionResult {
  return {
    stepNumber: 1,
    action: 'click',
    args: {},
    success: true,
    result: '',
    durationMs: 10,
    timestamp: new Date(0),
    ...overrides,
  };
}

describe('Summarizer', () => {
  const summarizer = new Summarizer(2);

  it('leaves a list within the window untouched', () => {
    const actions = [createAction(), createAction()];

    expect(summarizer.summarize(actions)).toEqual({
      milestones: [],
      remaining: actions,
    });
  });

  it('collapses consecutive successes with the same name', () => {
    const actions = [
      createAction({ action: 'scroll', result: 'scrolled' }),
      createAction({ action: 'scroll', result: 'scrolled to footer' }),
      createAction({ action: 'click' }),
      createAction({ action: 'wait' }),
      createAction({ action: 'screenshot' }),
    ];

    const { milestones, remaining } = summarizer.summarize(actions);

    expect(milestones).toEqual([
      'Completed 2 scroll actions (scrolled to footer)',
      'click',
    ]);
    expect(remaining.map((action) => action.action)).toEqual([
      'wait',
      'screenshot',
    ]);
  });

  it('notes failures separately and splits groups around them', () => {
    const actions = [
      createAction({ action: 'type_text', result: 'Typed 5 characters' }),
      createAction({ action: 'click', success: false, result: 'not found' }),
      createAction({ action: 'type_text' }),
      createAction(),
      createAction(),
    ];

    expect(summarizer.summarize(actions).milestones).toEqual([
      'type_text: Typed 5 characters',
      'Attempted click (failed)',
      'type_text',
    ]);
  });

  describe('summarizeForPhaseChange', () => {
    it('returns nothing for the initial empty phase', () => {
      expect(summarizer.summarizeForPhaseChange('', [createAction()])).toBe('');
    });

    it('counts successful actions of the finished phase', () => {
      expect(
        summarizer.summarizeForPhaseChange('search', [
          createAction(),
          createAction({ success: false }),
          createAction(),
        ]),
      ).toBe('Completed search phase (2 actions)');
    });

    it('marks a phase without successes as attempted', () => {
      expect(
        summarizer.summarizeForPhaseChange('checkout', [
          createAction({ success: false }),
        ]),
      ).toBe('Attempted checkout phase');
    });
  });
});
