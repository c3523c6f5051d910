import { z } from 'zod';
import type { Detection, SecurityEvent } from '../../types.js';
import type { DetectorStage } from '../types.js';

export interface ModelAnomalyOptions {
  endpoint?: string;
  model?: string;
  fetchImpl?: typeof fetch;
}

const generateResponseSchema = z.object({ response: z.string() });

const verdictSchema = z.object({
  anomaly: z.boolean(),
  attack_type: z.string().min(1).optional(),
  severity: z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']).optional(),
  reason: z.string().optional()
});

export type ModelVerdict = z.infer<typeof verdictSchema>;

const PROMPT_HEADER =
  'You review application security events. Reply with JSON only: ' +
  '{"anomaly": boolean, "attack_type": string, "severity": "LOW"|"MEDIUM"|"HIGH"|"CRITICAL", "reason": string}.';

export function buildPrompt(event: SecurityEvent): string {
  const summary = {
    event_type: event.eventType,
    user_id: event.userId ?? null,
    source_ip: event.sourceIp,
    payload: event.payload
  };
  return `${PROMPT_HEADER}\nEvent: ${JSON.stringify(summary)}`;
}

/** Reads the verdict out of a model reply, tolerating prose around the JSON object. */
export function parseVerdict(text: string): ModelVerdict {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start < 0 || end <= start) {
    throw new Error('model reply contained no JSON object');
  }
  const parsed: unknown = JSON.parse(text.slice(start, end + 1));
  return verdictSchema.parse(parsed);
}

/**
 * Asks an Ollama-style `/api/generate` endpoint whether the event looks
 * anomalous. Without an endpoint the stage is inert.
 */
export class ModelAnomalyDetector implements DetectorStage {
  readonly name = 'model-anomaly';
  readonly expensive = true;
  private readonly endpoint: string | null;
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ModelAnomalyOptions = {}) {
    const endpoint = options.endpoint?.trim();
    this.endpoint = endpoint ? endpoint.replace(/\/+$/, '') : null;
    this.model = options.model ?? 'llama3';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get enabled(): boolean {
    return this.endpoint !== null;
  }

  async classify(event: SecurityEvent, signal?: AbortSignal): Promise<Detection | null> {
    if (!this.endpoint) {
      return null;
    }

    const response = await this.fetchImpl(`${this.endpoint}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, prompt: buildPrompt(event), stream: false, format: 'json' }),
      signal
    });
    if (!response.ok) {
      throw new Error(`model endpoint returned ${response.status}`);
    }

    const body = generateResponseSchema.parse(await response.json());
    const verdict = parseVerdict(body.response);
    if (!verdict.anomaly) {
      return null;
    }

    return {
      attackType: verdict.attack_type?.toUpperCase().replace(/\s+/g, '_') ?? 'ANOMALY',
      severity: verdict.severity ?? 'MEDIUM',
      description: verdict.reason ?? 'Model flagged the event as anomalous',
      evidence: { model: this.model }
    };
  }
}
