import type { Detection, SecurityEvent } from '../../types.js';
import { collectStrings, type DetectorStage } from '../types.js';

const SQL_INJECTION_PATTERNS: Array<{ label: string; pattern: RegExp }> = [
  { label: 'tautology', pattern: /'\s*or\s*'?\w+'?\s*=\s*'?\w+/i },
  { label: 'union-select', pattern: /\bunion\b[\s\S]*\bselect\b/i },
  { label: 'stacked-query', pattern: /;\s*(drop|delete|insert|update|select|shutdown)\b/i },
  { label: 'time-based', pattern: /\b(pg_sleep|sleep|benchmark|waitfor\s+delay)\s*\(/i },
  { label: 'comment-terminator', pattern: /'\s*(--|#|\/\*)/ }
];

export class SqlInjectionDetector implements DetectorStage {
  readonly name = 'sql-injection';

  classify(event: SecurityEvent): Detection | null {
    for (const value of collectStrings(event.payload)) {
      const matched = SQL_INJECTION_PATTERNS.filter(entry => entry.pattern.test(value)).map(entry => entry.label);
      if (matched.length > 0) {
        return {
          attackType: 'SQL_INJECTION',
          severity: 'HIGH',
          description: 'SQL injection pattern found in request payload',
          evidence: { patterns: matched, sample: value.slice(0, 120) }
        };
      }
    }
    return null;
  }
}
