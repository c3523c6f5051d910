import type { EventBus } from '../eventBus.js';
import loggerModule, { type Logger } from '../logger.js';
import { sleep, type TaskSupervisor } from '../tasks/supervisor.js';
import type { EventInput, SubmitResult, ThreatResponder } from './threatResponder.js';

export type SimulationTemplate = {
  name: string;
  eventType: string;
  sourceIp: string;
  userId?: string;
  payloads: Array<Record<string, unknown>>;
};

// Addresses come from the TEST-NET documentation ranges.
export const DEFAULT_TEMPLATES: SimulationTemplate[] = [
  {
    name: 'sql-injection',
    eventType: 'simulated_sql_injection',
    sourceIp: '198.51.100.10',
    payloads: [
      { username: "admin' OR '1'='1--", password: 'pw' },
      { query: "'; SELECT pg_sleep(2); --" },
      { id: '1 UNION SELECT null, version(), null--' }
    ]
  },
  {
    name: 'xss',
    eventType: 'simulated_xss',
    sourceIp: '198.51.100.20',
    payloads: [
      { comment: "<script>console.log('SimulatedXSS')</script>" },
      { search: '"><img src=x onerror=console.error(\'SimulatedXSS\')>' },
      { profile: "javascript:console.warn('SimulatedXSS')" }
    ]
  },
  {
    name: 'payment-anomaly',
    eventType: 'simulated_payment_anomaly',
    sourceIp: '198.51.100.30',
    payloads: [
      { card_number: '4242-4242-4242-4242', cvv: '123', expiry_date: '12/28', amount: '1850.00', currency: 'USD' },
      { payment_token: 'tok_simulated_0001', amount: '1.00', currency: 'EUR' }
    ]
  },
  {
    name: 'card-testing',
    eventType: 'payment_failure',
    sourceIp: '198.51.100.40',
    payloads: [
      { card_bin: '411111', reason: 'Insufficient Funds' },
      { card_bin: '510510', reason: 'Invalid CVV' },
      { card_bin: '400000', reason: 'Do Not Honor' },
      { card_bin: '411111', reason: 'Expired Card' }
    ]
  },
  {
    name: 'brute-force',
    eventType: 'login_failed',
    sourceIp: '198.51.100.50',
    userId: 'simulated-user',
    payloads: Array.from({ length: 6 }, (_, attempt) => ({ attempt: attempt + 1 }))
  }
];

export type SimulationSummary = {
  sent: number;
  threats: number;
  blocked: number;
  rateLimited: number;
};

export type SimulationStartResult = { status: 'scheduled' } | { status: 'already_running' };

export interface AttackSimulationOptions {
  responder: ThreatResponder;
  bus: EventBus;
  supervisor: TaskSupervisor;
  templates?: SimulationTemplate[];
  delayMs?: number;
  logger?: Logger;
}

/** Replays templated attacks through the responder, as a client population would. */
export class AttackSimulation {
  private readonly options: AttackSimulationOptions;
  private readonly templates: SimulationTemplate[];
  private readonly delayMs: number;
  private readonly logger: Logger;
  private active: Promise<void> | null = null;

  constructor(options: AttackSimulationOptions) {
    this.options = options;
    this.templates = options.templates ?? DEFAULT_TEMPLATES;
    this.delayMs = Math.max(0, options.delayMs ?? 250);
    this.logger = options.logger ?? loggerModule;
  }

  get running(): boolean {
    return this.active !== null;
  }

  start(): SimulationStartResult {
    if (this.active) {
      return { status: 'already_running' };
    }
    const handle = this.options.supervisor.spawn('simulation', async signal => {
      await this.run(signal);
    });
    this.active = handle.done;
    void handle.done.then(() => {
      this.active = null;
    });
    return { status: 'scheduled' };
  }

  /** Resolves once the current run, if any, has finished. */
  async settled(): Promise<void> {
    if (this.active) {
      await this.active;
    }
  }

  async run(signal: AbortSignal): Promise<SimulationSummary> {
    const { bus, responder } = this.options;
    const summary: SimulationSummary = { sent: 0, threats: 0, blocked: 0, rateLimited: 0 };
    bus.publishStatus({ type: 'simulation_status', status: 'running', message: 'Attack simulation initiated' });
    this.logger.info({ templates: this.templates.map(template => template.name) }, 'Attack simulation started');

    try {
      for (const template of this.templates) {
        for (const payload of template.payloads) {
          if (signal.aborted) {
            throw new Error('Simulation cancelled');
          }
          const input: EventInput = {
            eventType: template.eventType,
            userId: template.userId,
            payload,
            sourceIp: template.sourceIp
          };
          tally(summary, await responder.submitEvent(input));
          if (this.delayMs > 0) {
            await sleep(this.delayMs, signal);
          }
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error, summary }, 'Attack simulation failed');
      bus.publishStatus({ type: 'simulation_status', status: 'failed', message: `Simulation failed: ${message}` });
      throw error;
    }

    this.logger.info({ summary }, 'Attack simulation completed');
    bus.publishStatus({
      type: 'simulation_status',
      status: 'completed',
      message: `Simulation finished: ${summary.sent} events, ${summary.threats} threats, ${summary.blocked} blocked`
    });
    return summary;
  }
}

function tally(summary: SimulationSummary, result: SubmitResult) {
  summary.sent += 1;
  if (result.status === 'threat_detected') {
    summary.threats += 1;
  } else if (result.status === 'rejected') {
    if (result.httpStatus === 403) {
      summary.threats += 1;
      summary.blocked += 1;
    } else {
      summary.rateLimited += 1;
    }
  }
}
