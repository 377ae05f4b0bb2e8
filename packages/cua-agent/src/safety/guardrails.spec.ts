import { CuaErrorCode, SafetyError } from '@cua/shared';
import { Guardrails } from './guardrails';
import { RateLimiter } from './rate-limiter';

describe('Guardrails', () => {
  it('allows ordinary actions and audits them', () => {
    const guardrails = new Guardrails();

    expect(guardrails.validateAction('click', '(10, 20)', 'Executed click')).toBeNull();
    expect(guardrails.getAuditEntries()).toEqual([
      expect.objectContaining({
        level: 'ACTION',
        action: 'click',
        target: '(10, 20)',
        description: 'Executed click',
      }),
    ]);
  });

  it('pauses on a pending takeover and stays paused until resumed', () => {
    const guardrails = new Guardrails();
    guardrails.requestTakeover('operator needs the mouse');

    const first = guardrails.validateAction('click', '(1, 1)', '');
    expect(first?.code).toBe(CuaErrorCode.HumanTakeover);
    expect(first?.message).toBe(
      'human takeover requested: operator needs the mouse',
    );
    expect(guardrails.isPaused()).toBe(true);
    expect(guardrails.validateAction('click', '(1, 1)', '')?.code).toBe(
      CuaErrorCode.HumanTakeover,
    );

    guardrails.resume();
    expect(guardrails.validateAction('click', '(1, 1)', '')).toBeNull();
  });

  it('denies actions after too many consecutive failures', () => {
    const guardrails = new Guardrails({ maxConsecutiveFailures: 2 });
    guardrails.recordFailure('click', '(1, 1)', new Error('missed'));
    guardrails.recordFailure('click', '(1, 1)', new Error('missed'));

    const denied = guardrails.validateAction('click', '(1, 1)', '');
    expect(denied?.code).toBe(CuaErrorCode.AgentStuck);
    expect(denied?.message).toBe('too many consecutive failures');

    guardrails.recordSuccess('click', '(1, 1)', 'ok');
    expect(guardrails.getConsecutiveFailures()).toBe(0);
    expect(guardrails.validateAction('click', '(1, 1)', '')).toBeNull();
  });

  it('denies actions once the rate limit is spent', () => {
    const guardrails = new Guardrails(
      {},
      { rateLimiter: new RateLimiter(1, () => 0) },
    );

    expect(guardrails.validateAction('wait', '100ms', '')).toBeNull();
    expect(guardrails.validateAction('wait', '100ms', '')?.code).toBe(
      CuaErrorCode.RateLimited,
    );
    expect(guardrails.getAuditEntries()[1]).toMatchObject({
      level: 'WARNING',
      description: 'Rate limited',
      metadata: { action: 'wait', target: '100ms' },
    });
  });

  describe('sensitive actions', () => {
    it('allows confirm-level matches at normal level with a warning', () => {
      const guardrails = new Guardrails({ level: 'normal' });

      expect(
        guardrails.validateAction('type_text', 'password123', 'Executed type_text'),
      ).toBeNull();
      expect(guardrails.getAuditEntries()[0]).toMatchObject({
        level: 'WARNING',
        description: 'Sensitive action detected',
        metadata: { matches: 1, level: 'confirm' },
      });
    });

    it('blocks confirm-level matches at strict level', () => {
      const guardrails = new Guardrails({ level: 'strict' });

      const denied = guardrails.validateAction(
        'type_text',
        'password123',
        'Executed type_text',
      );

      expect(denied).toBeInstanceOf(SafetyError);
      expect(denied?.code).toBe(CuaErrorCode.SafetyBlock);
      expect(denied?.message).toBe(
        'action blocked by safety check (password_field)',
      );
    });

    it('blocks block-level matches at normal level', () => {
      const guardrails = new Guardrails();

      expect(
        guardrails.validateAction('type_text', 'routing number 1234', '')?.code,
      ).toBe(CuaErrorCode.SafetyBlock);
    });

    it('skips pattern checks at minimal level', () => {
      const guardrails = new Guardrails({ level: 'minimal' });

      expect(
        guardrails.validateAction('type_text', 'routing number 1234', ''),
      ).toBeNull();
      expect(guardrails.getAuditEntries()).toHaveLength(1);
    });

    it('applies a level change immediately', () => {
      const guardrails = new Guardrails({ level: 'strict' });
      guardrails.setLevel('normal');

      expect(guardrails.level).toBe('normal');
      expect(guardrails.validateAction('type_text', 'password', '')).toBeNull();
    });
  });
});
