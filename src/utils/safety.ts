import { createLogger } from './logger';

const log = createLogger('input-guard');

export interface GuardedInput {
  text: string;
  modified: boolean;
  warnings: string[];
}

export const DEFAULT_MAX_INPUT_LENGTH = 1000;

// Stripped before the message reaches detection, memory or the prompt
const STRIP_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: 'script tag', pattern: /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi },
  { name: 'javascript protocol', pattern: /javascript:/gi },
  { name: 'event handler', pattern: /\bon\w+\s*=/gi },
  { name: 'template expression', pattern: /\{\{.*?\}\}/g },
  { name: 'control character', pattern: /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g }
];

// Logged only; the user may legitimately talk about these things
const WARNING_PATTERNS: RegExp[] = [
  /\bignore (?:all |any )?(?:previous|prior|above) instructions\b/i,
  /\b(?:you are now|pretend to be|act as) (?:a |an )?(?:different|new) (?:assistant|character|persona)\b/i,
  /\bsystem prompt\b/i
];

export class InputGuard {
  private maxLength: number;

  constructor(maxLength: number = DEFAULT_MAX_INPUT_LENGTH) {
    this.maxLength = maxLength;
  }

  sanitize(input: string): GuardedInput {
    const warnings: string[] = [];
    let text = input;

    for (const { name, pattern } of STRIP_PATTERNS) {
      const stripped = text.replace(pattern, '');
      if (stripped !== text) {
        warnings.push(`removed ${name}`);
        text = stripped;
      }
    }

    text = text.trim();
    if (text.length > this.maxLength) {
      warnings.push(`truncated to ${this.maxLength} characters`);
      text = text.substring(0, this.maxLength);
    }

    for (const pattern of WARNING_PATTERNS) {
      if (pattern.test(text)) {
        warnings.push(`suspicious phrasing: ${pattern.source}`);
      }
    }

    if (warnings.length > 0) {
      log.warn(`⚠️  Input guard: ${warnings.join(', ')}`);
    }

    return { text, modified: text !== input, warnings };
  }
}
