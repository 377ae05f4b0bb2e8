import {
  MAX_FAILED_PATTERNS,
  MAX_MILESTONES,
  MAX_RECENT_ACTIONS,
  TaskMemory,
} from './task-memory';

describe('TaskMemory', () => {
  let memory: TaskMemory;

  beforeEach(() => {
    memory = new TaskMemory('open calculator');
  });

  it('keeps the original task verbatim', () => {
    const long = 'x'.repeat(5000);
    expect(new TaskMemory(long).summary().originalTask).toBe(long);
  });

  it('tracks consecutive failures and resets them on success', () => {
    memory.recordAction('click', {}, false, 'not found', 5);
    memory.recordAction('click', {}, false, 'not found', 5);
    expect(memory.summary().consecutiveFails).toBe(2);
    expect(memory.summary().lastError).toMatchObject({
      message: 'not found',
      action: 'click',
      stepNumber: 2,
      recoverable: true,
    });

    memory.recordAction('click', {}, true, 'clicked', 5);

    expect(memory.summary().consecutiveFails).toBe(0);
    expect(memory.summary().lastError).toBeNull();
  });

  it('flags stuck at three and needs-help at five failures', () => {
    for (let i = 0; i < 3; i++) {
      memory.recordAction('click', {}, false, 'nope', 1);
    }
    expect(memory.isStuck()).toBe(true);
    expect(memory.needsHelp()).toBe(false);

    memory.recordAction('click', {}, false, 'nope', 1);
    memory.recordAction('click', {}, false, 'nope', 1);
    expect(memory.needsHelp()).toBe(true);
  });

  it('bounds recent actions and milestones on long runs', () => {
    for (let i = 0; i < 200; i++) {
      memory.recordAction(i % 2 === 0 ? 'click' : 'wait', {}, true, '', 1);
      const summary = memory.summary();
      expect(summary.recentActions.length).toBeLessThanOrEqual(
        MAX_RECENT_ACTIONS,
      );
      expect(summary.milestones.length).toBeLessThanOrEqual(MAX_MILESTONES);
    }
    expect(memory.summary().totalSteps).toBe(200);
  });

  it('folds the oldest action into a milestone when the window overflows', () => {
    memory.recordAction('screenshot', {}, true, 'Captured 1280x831', 1);
    for (let i = 0; i < MAX_RECENT_ACTIONS; i++) {
      memory.recordAction('wait', {}, true, '', 1);
    }

    const summary = memory.summary();
    expect(summary.milestones).toEqual(['screenshot: Captured 1280x831']);
    expect(summary.recentActions[0].stepNumber).toBe(2);
  });

  it('summarizes the outgoing phase on a phase change', () => {
    memory.setPhase('search');
    memory.recordAction('type_text', {}, true, '', 1);
    memory.recordAction('key_press', {}, true, '', 1);

    memory.setPhase('browsing');

    const summary = memory.summary();
    expect(summary.milestones).toEqual(['Completed search phase (2 actions)']);
    expect(summary.recentActions).toEqual([]);
    expect(summary.phase).toBe('browsing');
  });

  it('treats setting the same phase twice as a no-op', () => {
    memory.setPhase('search');
    memory.recordAction('type_text', {}, true, '', 1);
    memory.setPhase('search');

    expect(memory.summary().milestones).toEqual([]);
    expect(memory.summary().recentActions).toHaveLength(1);
  });

  it('keeps the phase when inference finds nothing', () => {
    memory.setPhase('checkout');
    expect(memory.maybeUpdatePhase({ visibleText: 'Calculator' })).toBe(
      'checkout',
    );
    expect(memory.maybeUpdatePhase({ visibleText: 'Sign in' })).toBe(
      'authentication',
    );
  });

  it('deduplicates and bounds failed patterns', () => {
    memory.addFailedPattern('click (10, 10)');
    memory.addFailedPattern('click (10, 10)');
    expect(memory.summary().failedPatterns).toEqual(['click (10, 10)']);

    for (let i = 0; i < 15; i++) {
      memory.addFailedPattern(`pattern ${i}`);
    }
    const patterns = memory.summary().failedPatterns;
    expect(patterns).toHaveLength(MAX_FAILED_PATTERNS);
    expect(patterns[patterns.length - 1]).toBe('pattern 14');
    expect(memory.hasFailedPattern('click (10, 10)')).toBe(false);
  });

  it('stores key facts', () => {
    memory.setKeyFact('screen', '1512x982 logical');
    expect(memory.getKeyFact('screen')).toBe('1512x982 logical');
    expect(memory.getKeyFact('missing')).toBeUndefined();
  });

  it('returns snapshots that do not change with later updates', () => {
    const before = memory.summary();
    memory.recordAction('click', {}, true, '', 1);
    expect(before.totalSteps).toBe(0);
    expect(before.recentActions).toEqual([]);
  });

  describe('toPrompt', () => {
    it('renders only the task for a fresh memory', () => {
      expect(memory.toPrompt()).toBe('## TASK\nopen calculator');
    });

    it('renders every populated section in order', () => {
      memory.addMilestone('Opened Spotlight');
      memory.setPhase('search');
      memory.setKeyFact('screen', '1512x982 logical');
      memory.recordAction('type_text', {}, true, 'Typed 10 characters', 1);
      memory.recordAction('click', {}, false, 'element not found', 1);
      memory.addFailedPattern('click (10, 10)');

      expect(memory.toPrompt()).toBe(
        [
          '## TASK\nopen calculator',
          '## ACCOMPLISHED\n1. Opened Spotlight',
          '## CURRENT PHASE: search',
          '## KEY FACTS\n- screen: 1512x982 logical',
          '## RECENT ACTIONS\n✓ Step 1: type_text - Typed 10 characters\n✗ Step 2: click - element not found',
          '## KNOWN ISSUES (avoid repeating)\n- click (10, 10)',
        ].join('\n\n'),
      );
    });

    it('shows the needs-help banner after five failures', () => {
      for (let i = 0; i < 5; i++) {
        memory.recordAction('click', {}, false, 'element not found', 1);
      }
      expect(memory.toPrompt()).toContain('## STATUS: NEEDS HELP');
      expect(memory.toPrompt()).not.toContain('POSSIBLY STUCK');
    });
  });
});
