import type { Logger } from 'pino';
import { withTimeout } from '@code-verdict/resilience';
import type { QualityModel, QualityPrediction, ReferenceMatch } from '../collaborators.js';
import { signalUnavailable } from '../errors.js';
import { silentLogger } from '../lib/logger.js';
import { failed, succeeded, type ProducerOutcome } from '../adapter/outcome.js';

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function isValidMatch(match: ReferenceMatch): boolean {
  return (
    match.reference.length > 0 &&
    inUnitRange(match.quality) &&
    Number.isFinite(match.similarity) &&
    Math.abs(match.similarity) <= 1
  );
}

/**
 * Quality Predictor Adapter - wraps a learned quality model.
 *
 * Failures and timeouts become failed outcomes. A prediction outside [0, 1]
 * is reported as out_of_domain instead of being clamped, so model drift stays
 * visible.
 */
export class QualityPredictorAdapter {
  private readonly logger: Logger;

  constructor(
    private readonly model: QualityModel,
    private readonly timeoutMs: number,
    logger?: Logger,
  ) {
    this.logger = logger ?? silentLogger();
  }

  async predict(embedding: readonly number[]): Promise<ProducerOutcome<QualityPrediction>> {
    let prediction: QualityPrediction;
    try {
      prediction = await withTimeout((signal) => this.model.predict(embedding, signal), this.timeoutMs, 'Quality model');
    } catch (e) {
      const error = signalUnavailable('predicted_quality', e);
      this.logger.warn({ reason: error.reason, err: error }, 'Quality prediction failed');
      return failed(error.reason, error.message);
    }

    if (!inUnitRange(prediction.quality)) {
      this.logger.warn({ quality: prediction.quality }, 'Predicted quality outside declared range');
      return failed('out_of_domain', `predicted quality ${prediction.quality} is outside [0, 1]`);
    }
    if (!inUnitRange(prediction.confidence)) {
      this.logger.warn({ confidence: prediction.confidence }, 'Model confidence outside declared range');
      return failed('out_of_domain', `model confidence ${prediction.confidence} is outside [0, 1]`);
    }

    const { quality, confidence, match } = prediction;
    if (match === undefined) {
      return succeeded({ quality, confidence });
    }
    if (!isValidMatch(match)) {
      this.logger.warn({ match }, 'Discarding malformed reference match');
      return succeeded({ quality, confidence });
    }
    return succeeded({ quality, confidence, match: { ...match } });
  }
}
