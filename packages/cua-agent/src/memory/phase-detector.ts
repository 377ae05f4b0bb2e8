import { Phase, PhaseObservation } from './memory.types';

interface PhaseRule {
  phase: Exclude<Phase, ''>;
  pattern: RegExp;
  roles?: string[];
  flag?: keyof NonNullable<PhaseObservation['flags']>;
}

// first match wins
const PHASE_RULES: PhaseRule[] = [
  {
    phase: 'authentication',
    pattern:
      /\b(sign in|sign-in|log in|login|password|username|two-factor|2fa|verification code)\b/,
    flag: 'passwordField',
  },
  {
    phase: 'checkout',
    pattern: /\b(checkout|payment|billing|place order|shopping cart|cart)\b/,
  },
  {
    phase: 'confirmation',
    pattern:
      /\b(confirm|confirmation|are you sure|thank you|order placed|successfully)\b/,
  },
  {
    phase: 'form_filling',
    pattern: /\b(form|required field|submit)\b/,
    roles: ['textfield', 'textarea', 'combobox', 'checkbox', 'radiobutton'],
    flag: 'formFields',
  },
  {
    phase: 'search',
    pattern: /\b(search|results for|spotlight)\b/,
    roles: ['searchfield'],
    flag: 'searchField',
  },
  {
    phase: 'navigation',
    pattern: /\b(address bar|url|navigate|go to|open|launch|loading)\b/,
  },
  {
    phase: 'browsing',
    pattern: /\b(scroll|article|read more|page|link)\b/,
  },
];

/**
 * Infers the workflow phase from what is on screen. Returns `null` when no
 * rule applies.
 */
export function detectPhase(observation: PhaseObservation): Phase | null {
  const text = (observation.visibleText ?? '').toLowerCase();
  const role = (observation.focusedRole ?? '').toLowerCase().replace(/^ax/, '');

  for (const rule of PHASE_RULES) {
    if (rule.flag && observation.flags?.[rule.flag]) {
      return rule.phase;
    }
    if (rule.roles && role && rule.roles.includes(role)) {
      return rule.phase;
    }
    if (text && rule.pattern.test(text)) {
      return rule.phase;
    }
  }

  return null;
}
