import type { Detection, SecurityEvent } from '../../types.js';
import { collectStrings, type DetectorStage } from '../types.js';

const XSS_PATTERNS: Array<{ label: string; pattern: RegExp }> = [
  { label: 'script-tag', pattern: /<\s*script\b/i },
  { label: 'event-handler', pattern: /\bon(error|load|click|mouseover|focus)\s*=/i },
  { label: 'javascript-uri', pattern: /javascript\s*:/i },
  { label: 'iframe', pattern: /<\s*iframe\b/i }
];

export class XssDetector implements DetectorStage {
  readonly name = 'xss';

  classify(event: SecurityEvent): Detection | null {
    for (const value of collectStrings(event.payload)) {
      const matched = XSS_PATTERNS.filter(entry => entry.pattern.test(value)).map(entry => entry.label);
      if (matched.length > 0) {
        return {
          attackType: 'XSS',
          severity: 'HIGH',
          description: 'Cross-site scripting payload found in request data',
          evidence: { patterns: matched, sample: value.slice(0, 120) }
        };
      }
    }
    return null;
  }
}
