import { InvalidArgumentError } from 'commander';
import { parseDuration, parseNumber, parsePositiveInt } from './options';

describe('parseDuration', () => {
  it.each([
    ['1500ms', 1500],
    ['90s', 90_000],
    ['2m', 120_000],
    ['1h', 3_600_000],
    ['45', 45_000],
    ['1.5s', 1500],
  ])('parses %s', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it('rejects unknown units and zero', () => {
    expect(() => parseDuration('2 days')).toThrow(InvalidArgumentError);
    expect(() => parseDuration('0s')).toThrow('duration must be positive');
  });
});

describe('numeric options', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt('50')).toBe(50);
    expect(() => parsePositiveInt('0')).toThrow(
      'expected a positive integer, got "0"',
    );
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
  });

  it('parses coordinates', () => {
    expect(parseNumber('-12.5')).toBe(-12.5);
    expect(() => parseNumber('left')).toThrow('expected a number, got "left"');
  });
});
