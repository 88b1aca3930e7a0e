import type { Logger } from 'pino';
import { ConfigurationError, type NormalizationConfig } from '@code-verdict/config';
import { silentLogger } from '../lib/logger.js';
import {
  createAnomalyNormalizer,
  createPredictedQualityNormalizer,
  createSecurityNormalizer,
  createStructureNormalizer,
  degradeAll,
  type ProducerNormalizer,
} from './normalizers.js';
import type { AdapterResult, ProducerName, RawOutputs } from './outcome.js';

/**
 * Signal Adapter - turns heterogeneous producer outputs into normalized signals.
 *
 * Holds one normalizer per producer and never throws for a bad output: every
 * problem ends up as a degraded entry. Has no side effects beyond debug logging.
 */
export class SignalAdapter {
  private readonly normalizers: Map<ProducerName, ProducerNormalizer> = new Map();
  private readonly logger: Logger;

  constructor(normalizers: ProducerNormalizer[], logger?: Logger) {
    for (const normalizer of normalizers) {
      if (this.normalizers.has(normalizer.producer)) {
        throw new ConfigurationError(`Normalizer for producer ${normalizer.producer} is already registered`);
      }
      this.normalizers.set(normalizer.producer, normalizer);
    }
    this.logger = logger ?? silentLogger();
  }

  /**
   * Adapter with the built-in normalizer for every category
   */
  static fromConfig(config: NormalizationConfig, logger?: Logger): SignalAdapter {
    return new SignalAdapter(
      [
        createStructureNormalizer(config.metrics),
        createSecurityNormalizer(config.securityConfidence),
        createAnomalyNormalizer(),
        createPredictedQualityNormalizer(),
      ],
      logger,
    );
  }

  getProducers(): ProducerName[] {
    return Array.from(this.normalizers.keys());
  }

  normalize(raw: RawOutputs): AdapterResult {
    const result: AdapterResult = { signals: [], degraded: [] };

    for (const normalizer of this.normalizers.values()) {
      const outcome = raw[normalizer.producer];

      let produced: AdapterResult;
      if (outcome === undefined) {
        produced = degradeAll(normalizer.signalNames, 'missing', `${normalizer.producer} producer did not run`);
      } else if (outcome.status === 'failed') {
        produced = degradeAll(normalizer.signalNames, outcome.reason, outcome.detail);
      } else {
        produced = normalizer.normalize(outcome.output);
      }

      result.signals.push(...produced.signals);
      result.degraded.push(...produced.degraded);
    }

    this.logger.debug(
      { signals: result.signals.length, degraded: result.degraded.map((d) => `${d.name}/${d.reason}`) },
      'Normalized producer outputs',
    );

    return result;
  }
}
