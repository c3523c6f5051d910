import { afterEach, describe, expect, it } from 'vitest';
import type { SecurityContext } from '../src/context.js';
import { createTestContext } from './helpers/context.js';

const contexts: SecurityContext[] = [];

afterEach(async () => {
  for (const context of contexts.splice(0)) {
    await context.close();
  }
});

function setup() {
  const created = createTestContext();
  contexts.push(created.context);
  return created;
}

describe('AttackSimulation', () => {
  it('replays every template through the responder', async () => {
    const { context, messages } = setup();

    const summary = await context.simulation.run(new AbortController().signal);

    expect(summary).toEqual({ sent: 18, threats: 10, blocked: 1, rateLimited: 1 });
    const statuses = messages.flatMap(message => (message.type === 'simulation_status' ? [message] : []));
    expect(statuses).toEqual([
      { type: 'simulation_status', status: 'running', message: 'Attack simulation initiated' },
      { type: 'simulation_status', status: 'completed', message: 'Simulation finished: 18 events, 10 threats, 1 blocked' }
    ]);
    expect(context.analytics().attackTypeCounts).toEqual({
      SQL_INJECTION: 3,
      XSS: 3,
      PAYMENT_ANOMALY: 1,
      CARD_TESTING: 1,
      BRUTE_FORCE: 2
    });
  });

  it('refuses a second run while one is active', async () => {
    const { context } = setup();

    expect(context.simulation.start()).toEqual({ status: 'scheduled' });
    expect(context.simulation.start()).toEqual({ status: 'already_running' });
    expect(context.simulation.running).toBe(true);

    await context.simulation.settled();
    expect(context.simulation.running).toBe(false);
  });

  it('reports a cancelled run as failed', async () => {
    const { context, messages } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(context.simulation.run(controller.signal)).rejects.toThrow('Simulation cancelled');
    expect(messages[messages.length - 1]).toEqual({
      type: 'simulation_status',
      status: 'failed',
      message: 'Simulation failed: Simulation cancelled'
    });
  });
});
