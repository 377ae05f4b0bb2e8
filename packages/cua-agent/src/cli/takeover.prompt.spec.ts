import { parseTakeoverResponse } from './takeover.prompt';

describe('parseTakeoverResponse', () => {
  it('accepts full words and first letters', () => {
    expect(parseTakeoverResponse('Abort')).toBe('abort');
    expect(parseTakeoverResponse(' r ')).toBe('resume');
    expect(parseTakeoverResponse('retry')).toBe('retry');
  });

  it('maps each advertised shortcut', () => {
    expect(parseTakeoverResponse('a')).toBe('abort');
    expect(parseTakeoverResponse('R')).toBe('resume');
    expect(parseTakeoverResponse('t')).toBe('retry');
  });

  it('rejects anything else', () => {
    expect(parseTakeoverResponse('')).toBeNull();
    expect(parseTakeoverResponse('maybe')).toBeNull();
    expect(parseTakeoverResponse('x')).toBeNull();
    expect(parseTakeoverResponse('constructor')).toBeNull();
  });
});
