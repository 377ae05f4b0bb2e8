import {
  compileSensitivePatterns,
  SensitiveDetector,
  SensitiveLevel,
} from './sensitive-detector';

describe('SensitiveDetector', () => {
  let detector: SensitiveDetector;

  beforeEach(() => {
    detector = new SensitiveDetector();
  });

  it('loads the bundled pattern list', () => {
    expect(detector.listPatterns().map((pattern) => pattern.name)).toEqual([
      'password_field',
      'api_key',
      'system_preferences',
      'security_privacy',
      'payment',
      'banking',
      'ssn',
      'delete',
      'shutdown',
      'send_email',
      'terminal',
    ]);
  });

  it('matches case-insensitively across action, target and description', () => {
    const matches = detector.check('type_text', 'Password123', 'Executed type_text');

    expect(matches).toHaveLength(1);
    expect(matches[0].pattern.name).toBe('password_field');
    expect(matches[0].matchedText).toBe('password');
    expect(detector.highestLevel(matches)).toBe(SensitiveLevel.Confirm);
  });

  it('reports the highest level among several matches', () => {
    const matches = detector.check('type_text', 'my bank password', '');

    expect(matches.map((match) => match.pattern.name)).toEqual([
      'password_field',
      'banking',
    ]);
    expect(detector.highestLevel(matches)).toBe(SensitiveLevel.Block);
  });

  it('returns no matches for harmless actions', () => {
    expect(detector.isSensitive('key_press', 'cmd+space', 'Executed key_press')).toBe(
      false,
    );
    expect(detector.highestLevel([])).toBe(SensitiveLevel.Warning);
  });

  it('adds and removes patterns at runtime', () => {
    detector.addPattern({
      name: 'calculator',
      pattern: /calculator/i,
      level: SensitiveLevel.Warning,
      description: 'test pattern',
    });
    expect(detector.isSensitive('type_text', 'Calculator', '')).toBe(true);

    detector.removePattern('calculator');
    expect(detector.isSensitive('type_text', 'Calculator', '')).toBe(false);
  });

  it('rejects malformed pattern definitions', () => {
    expect(() =>
      compileSensitivePatterns([{ name: 'x', pattern: 'y', level: 'panic' }]),
    ).toThrow();
  });
});
