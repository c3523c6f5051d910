import type { Detection, SecurityEvent } from '../../types.js';
import type { DetectorStage } from '../types.js';

export class PaymentAnomalyDetector implements DetectorStage {
  readonly name = 'payment-anomaly';

  constructor(private readonly amountThreshold: number) {}

  classify(event: SecurityEvent): Detection | null {
    if (!event.eventType.includes('payment')) {
      return null;
    }
    const raw = event.payload.amount;
    const amount = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number.parseFloat(raw) : Number.NaN;
    if (!Number.isFinite(amount) || amount <= this.amountThreshold) {
      return null;
    }
    return {
      attackType: 'PAYMENT_ANOMALY',
      severity: 'MEDIUM',
      description: `Payment amount ${amount} exceeds ${this.amountThreshold}`,
      evidence: { amount, currency: event.payload.currency ?? null }
    };
  }
}
