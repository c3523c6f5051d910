import type { Detection, SecurityEvent } from '../types.js';

export interface DetectorStage {
  readonly name: string;
  /** Marks the stage the pipeline runs last, behind the circuit breaker. */
  readonly expensive?: boolean;
  classify(event: SecurityEvent, signal?: AbortSignal): Promise<Detection | null> | Detection | null;
}

export function collectStrings(value: unknown, depth = 0, output: string[] = []): string[] {
  if (depth > 4) {
    return output;
  }
  if (typeof value === 'string') {
    output.push(value);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectStrings(item, depth + 1, output);
    }
  } else if (value && typeof value === 'object') {
    for (const item of Object.values(value)) {
      collectStrings(item, depth + 1, output);
    }
  }
  return output;
}
