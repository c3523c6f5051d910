import { performance } from 'node:perf_hooks';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { MetricsRegistry } from '../metrics/index.js';
import type { Detection, SecurityEvent } from '../types.js';
import { CircuitBreaker } from './circuitBreaker.js';
import type { DetectorStage } from './types.js';

export interface DetectorPipelineOptions {
  stages: DetectorStage[];
  breaker: CircuitBreaker;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export type PipelineRun = {
  detections: Detection[];
  earlyExit: boolean;
  expensiveStage: 'ran' | 'skipped' | 'failed' | 'not-run' | 'absent';
};

export class DetectorPipeline {
  private readonly stages: DetectorStage[];
  private readonly expensiveStage: DetectorStage | null;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: DetectorPipelineOptions) {
    const expensive = options.stages.filter(stage => stage.expensive);
    if (expensive.length > 1) {
      throw new Error(
        `Only one expensive detector stage is supported (got ${expensive.map(stage => stage.name).join(', ')})`
      );
    }
    const names = new Set<string>();
    for (const stage of options.stages) {
      if (names.has(stage.name)) {
        throw new Error(`Duplicate detector stage "${stage.name}"`);
      }
      names.add(stage.name);
    }

    this.stages = options.stages.filter(stage => !stage.expensive);
    this.expensiveStage = expensive[0] ?? null;
    this.breaker = options.breaker;
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  stageNames(): string[] {
    const names = this.stages.map(stage => stage.name);
    return this.expensiveStage ? [...names, this.expensiveStage.name] : names;
  }

  async evaluate(event: SecurityEvent): Promise<Detection[]> {
    const run = await this.run(event);
    return run.detections;
  }

  async run(event: SecurityEvent): Promise<PipelineRun> {
    const detections: Detection[] = [];

    for (const stage of this.stages) {
      const detection = await this.runStage(stage, event);
      if (!detection) {
        continue;
      }
      detections.push(detection);
      if (detection.severity === 'CRITICAL') {
        this.logger.debug(
          { detector: stage.name, attackType: detection.attackType },
          'Critical detection, skipping remaining stages'
        );
        return {
          detections,
          earlyExit: true,
          expensiveStage: this.expensiveStage ? 'not-run' : 'absent'
        };
      }
    }

    const stage = this.expensiveStage;
    if (!stage) {
      return { detections, earlyExit: false, expensiveStage: 'absent' };
    }

    const started = performance.now();
    const result = await this.breaker.execute(signal => Promise.resolve(stage.classify(event, signal)));
    switch (result.outcome) {
      case 'ok':
        this.metrics.recordDetectorRun(stage.name, result.value !== null, performance.now() - started);
        if (result.value) {
          detections.push(result.value);
        }
        return { detections, earlyExit: false, expensiveStage: 'ran' };
      case 'failed':
        this.metrics.recordDetectorError(stage.name, result.error.message);
        return { detections, earlyExit: false, expensiveStage: 'failed' };
      case 'skipped':
        this.logger.debug({ detector: stage.name, retryInMs: result.retryInMs }, 'Circuit open, stage skipped');
        return { detections, earlyExit: false, expensiveStage: 'skipped' };
    }
  }

  private async runStage(stage: DetectorStage, event: SecurityEvent): Promise<Detection | null> {
    const started = performance.now();
    try {
      const detection = await stage.classify(event);
      this.metrics.recordDetectorRun(stage.name, detection !== null, performance.now() - started);
      return detection;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.metrics.recordDetectorError(stage.name, message);
      this.logger.error({ err: error, detector: stage.name }, 'Detector stage failed');
      return null;
    }
  }
}
