import type { Logger } from 'pino';
import { z } from 'zod';
import type { VerdictConfig } from '@code-verdict/config';
import { mapWithConcurrency, withTimeout } from '@code-verdict/resilience';
import type { EnsembleVerdict } from '@code-verdict/anomaly';
import { SignalAdapter } from './adapter/signalAdapter.js';
import { normalizeEmbedding } from './adapter/embedding.js';
import { failed, succeeded, type ProducerOutcome, type RawOutputs } from './adapter/outcome.js';
import type { AssessmentCache } from './cache.js';
import type {
  AnomalyDetector,
  CodeReviewer,
  EmbeddingModel,
  QualityModel,
  ReferenceMatch,
  SecurityChecker,
  StructureAnalyzer,
} from './collaborators.js';
import { signalUnavailable, toError } from './errors.js';
import { silentLogger } from './lib/logger.js';
import { QualityPredictorAdapter } from './predictor/qualityPredictor.js';
import {
  InsightSchema,
  createCodeUnit,
  type Assessment,
  type CodeUnit,
  type DegradedSignal,
  type Insight,
} from './schemas/index.js';
import { ResultIntegrator } from './scoring/integrator.js';

const InsightListSchema = z.array(InsightSchema);

export interface Collaborators {
  structure: StructureAnalyzer;
  security: SecurityChecker;
  embedder: EmbeddingModel;
  qualityModel: QualityModel;
  ensemble: AnomalyDetector;
  /** Optional; its insights are reported but never scored */
  reviewer?: CodeReviewer;
}

export interface OrchestratorOptions {
  /** Opt-in cache; analyses share no state without one */
  cache?: AssessmentCache;
  logger?: Logger;
}

function verdictDegradations(verdict: EnsembleVerdict): DegradedSignal[] {
  const degraded: DegradedSignal[] = verdict.failures.map((f) => ({
    name: `detector:${f.detectorId}`,
    reason: f.reason,
    detail: f.message,
  }));

  if (!verdict.quorumMet) {
    degraded.push({
      name: 'anomaly_quorum',
      reason: 'quorum_failure',
      detail: `${verdict.validVotes} of ${verdict.totalDetectors} detectors produced a score`,
    });
  }
  return degraded;
}

function matchInsight(match: ReferenceMatch): Insight {
  return {
    kind: 'reference_match',
    code: 'similar_reference',
    category: 'predicted_quality',
    message:
      `Closest reference sample is "${match.reference}" ` +
      `(similarity ${match.similarity.toFixed(2)}, quality ${match.quality.toFixed(2)})`,
  };
}

/**
 * Quality Orchestrator - the single entry point for assessing code.
 *
 * Runs the collaborators, feeds their outputs through the Signal Adapter and
 * the Result Integrator, and always resolves with an Assessment. Failures of
 * any kind end up in `degradedSignals`.
 */
export class QualityOrchestrator {
  private readonly adapter: SignalAdapter;
  private readonly integrator: ResultIntegrator;
  private readonly predictor: QualityPredictorAdapter;
  private readonly logger: Logger;
  private readonly cache: AssessmentCache | undefined;

  /**
   * @throws ConfigurationError if the configuration cannot produce a score
   */
  constructor(
    private readonly collaborators: Collaborators,
    private readonly config: VerdictConfig,
    options: OrchestratorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger();
    this.cache = options.cache;
    this.adapter = SignalAdapter.fromConfig(config.normalization, this.logger);
    this.integrator = new ResultIntegrator(config.integrator, this.logger);
    this.predictor = new QualityPredictorAdapter(
      collaborators.qualityModel,
      config.analysis.providerTimeoutMs,
      this.logger,
    );
  }

  async comprehensiveAnalysis(input: string | CodeUnit): Promise<Assessment> {
    const unit = typeof input === 'string' ? createCodeUnit(input) : input;
    const logger = this.logger.child({ codeUnitId: unit.id });

    try {
      const rejection = this.validate(unit);
      if (rejection) {
        logger.info({ reason: rejection.detail }, 'Input rejected');
        return this.integrator.integrate(unit, [], [rejection]);
      }

      const cached = this.cache?.get(unit.id);
      if (cached) {
        logger.debug('Assessment served from cache');
        return cached;
      }

      const assessment = await this.analyze(unit, logger);
      this.cache?.set(unit.id, assessment);

      logger.info(
        {
          status: assessment.status,
          overallScore: assessment.overallScore,
          confidence: assessment.confidence,
          degraded: assessment.degradedSignals.length,
        },
        'Analysis complete',
      );
      return assessment;
    } catch (e) {
      const error = toError(e);
      logger.error({ err: error }, 'Analysis failed unexpectedly');
      return this.integrator.integrate(unit, [], [{ name: 'analysis', reason: 'unavailable', detail: error.message }]);
    }
  }

  /**
   * Analyze many units with a bounded worker pool. Results keep input order.
   */
  async comprehensiveAnalysisMany(inputs: readonly (string | CodeUnit)[]): Promise<Assessment[]> {
    return mapWithConcurrency(inputs, this.config.analysis.batchConcurrency, (input) =>
      this.comprehensiveAnalysis(input),
    );
  }

  private validate(unit: CodeUnit): DegradedSignal | undefined {
    if (unit.source.trim().length === 0) {
      return { name: 'input', reason: 'out_of_domain', detail: 'source is empty' };
    }
    const bytes = Buffer.byteLength(unit.source, 'utf8');
    const limit = this.config.analysis.maxCodeBytes;
    if (bytes > limit) {
      return { name: 'input', reason: 'out_of_domain', detail: `source is ${bytes} bytes, limit is ${limit}` };
    }
    return undefined;
  }

  private async analyze(unit: CodeUnit, logger: Logger): Promise<Assessment> {
    const { structure, security, embedder, ensemble, reviewer } = this.collaborators;

    const [structureOutcome, securityOutcome, embeddingOutcome, reviewOutcome] = await Promise.all([
      this.call('structure', (signal) => structure.analyzeStructure(unit.source, signal), logger),
      this.call('security', (signal) => security.scan(unit.source, signal), logger),
      this.call('embedding', (signal) => embedder.embed(unit.source, signal), logger),
      reviewer === undefined
        ? Promise.resolve(succeeded<Insight[]>([]))
        : this.call('review', (signal) => reviewer.review(unit.source, signal), logger),
    ]);

    const raw: RawOutputs = { structure: structureOutcome, security: securityOutcome };
    const degraded: DegradedSignal[] = [];
    const insights: Insight[] = [];

    if (reviewOutcome.status === 'ok') {
      const parsed = InsightListSchema.safeParse(reviewOutcome.output);
      if (parsed.success) {
        insights.push(...parsed.data);
      } else {
        logger.warn({ issues: parsed.error.errors.length }, 'Reviewer returned malformed insights');
        degraded.push({ name: 'review', reason: 'out_of_domain', detail: 'reviewer returned malformed insights' });
      }
    } else {
      degraded.push({ name: 'review', reason: reviewOutcome.reason, detail: reviewOutcome.detail });
    }

    if (embeddingOutcome.status === 'failed') {
      degraded.push({ name: 'embedding', reason: embeddingOutcome.reason, detail: embeddingOutcome.detail });
    } else {
      const embedding = normalizeEmbedding(embeddingOutcome.output, embedder.dimension);
      if ('degraded' in embedding) {
        degraded.push(embedding.degraded);
      } else {
        const vector = embedding.signal.value;
        const [anomalyOutcome, prediction] = await Promise.all([
          this.settle('anomaly', () => ensemble.detect(vector), logger),
          this.predictor.predict(vector),
        ]);

        raw.anomaly = anomalyOutcome;
        raw.predicted_quality = prediction;
        if (prediction.status === 'ok' && prediction.output.match !== undefined) {
          insights.push(matchInsight(prediction.output.match));
        }
        if (anomalyOutcome.status === 'ok') {
          degraded.push(...verdictDegradations(anomalyOutcome.output));
        }
      }
    }
    // Without a usable embedding, anomaly and predicted_quality stay absent and
    // the adapter reports them as missing

    const { signals, degraded: adapted } = this.adapter.normalize(raw);
    return this.integrator.integrate(unit, signals, [...degraded, ...adapted], insights);
  }

  /**
   * Run a collaborator under the provider timeout
   */
  private call<T>(
    name: string,
    fn: (signal: AbortSignal) => Promise<T>,
    logger: Logger,
  ): Promise<ProducerOutcome<T>> {
    return this.settle(name, () => withTimeout(fn, this.config.analysis.providerTimeoutMs, `${name} provider`), logger);
  }

  private async settle<T>(name: string, fn: () => Promise<T>, logger: Logger): Promise<ProducerOutcome<T>> {
    try {
      return succeeded(await fn());
    } catch (e) {
      const error = signalUnavailable(name, e);
      logger.warn({ producer: name, reason: error.reason, err: error }, 'Producer failed');
      return failed(error.reason, error.message);
    }
  }
}
