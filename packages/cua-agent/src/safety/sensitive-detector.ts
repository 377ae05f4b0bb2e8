import { z } from 'zod';
import defaultPatterns from './sensitive-patterns.json';

export enum SensitiveLevel {
  Warning = 0,
  Confirm = 1,
  Block = 2,
}

export interface SensitivePattern {
  name: string;
  pattern: RegExp;
  level: SensitiveLevel;
  description: string;
}

export interface SensitiveMatch {
  pattern: SensitivePattern;
  matchedText: string;
}

const LEVELS: Record<'warning' | 'confirm' | 'block', SensitiveLevel> = {
  warning: SensitiveLevel.Warning,
  confirm: SensitiveLevel.Confirm,
  block: SensitiveLevel.Block,
};

const patternDefinitionSchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  level: z.enum(['warning', 'confirm', 'block']),
  description: z.string(),
});

export type SensitivePatternDefinition = z.infer<typeof patternDefinitionSchema>;

/**
 * Validates pattern definitions (as stored in sensitive-patterns.json) and
 * compiles them. Matching is case-insensitive.
 */
export function compileSensitivePatterns(
  definitions: unknown,
): SensitivePattern[] {
  return z
    .array(patternDefinitionSchema)
    .parse(definitions)
    .map((definition) => ({
      name: definition.name,
      pattern: new RegExp(definition.pattern, 'i'),
      level: LEVELS[definition.level],
      description: definition.description,
    }));
}

export class SensitiveDetector {
  private patterns: SensitivePattern[];

  constructor(patterns: SensitivePattern[] = compileSensitivePatterns(defaultPatterns)) {
    this.patterns = [...patterns];
  }

  check(action: string, target: string, description: string): SensitiveMatch[] {
    const text = `${action} ${target} ${description}`.toLowerCase();

    const matches: SensitiveMatch[] = [];
    for (const pattern of this.patterns) {
      const found = pattern.pattern.exec(text);
      if (found) {
        matches.push({ pattern, matchedText: found[0] });
      }
    }
    return matches;
  }

  isSensitive(action: string, target: string, description: string): boolean {
    return this.check(action, target, description).length > 0;
  }

  highestLevel(matches: SensitiveMatch[]): SensitiveLevel {
    return matches.reduce(
      (highest, match) => Math.max(highest, match.pattern.level),
      SensitiveLevel.Warning,
    );
  }

  addPattern(pattern: SensitivePattern): void {
    this.patterns.push(pattern);
  }

  removePattern(name: string): void {
    this.patterns = this.patterns.filter((pattern) => pattern.name !== name);
  }

  listPatterns(): SensitivePattern[] {
    return [...this.patterns];
  }
}
