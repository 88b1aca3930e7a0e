import { z } from 'zod';
import type { Logger } from 'pino';
import { ReferenceSet, createDefaultRegistry, createEnsemble } from '@code-verdict/anomaly';
import { ConfigurationError, type VerdictConfig } from '@code-verdict/config';
import type { Collaborators } from '@code-verdict/verdict-core';
import { readDataFile } from './data.js';
import { FeatureHashEmbedder, DEFAULT_EMBEDDING_DIMENSION } from './embedder.js';
import { NearestNeighborQualityModel } from './qualityModel.js';
import { createPythonParser, findSyntaxError } from './parser.js';
import { RuleBasedReviewer } from './reviewer.js';
import { PatternSecurityScanner, type SecurityRule } from './security.js';
import { TreeSitterStructureAnalyzer } from './structure.js';

export const referenceSampleSchema = z.object({
  /** Reported when the sample is the closest match */
  name: z.string().min(1).optional(),
  code: z.string().min(1),
  quality: z.number().min(0).max(1),
});
export type ReferenceSample = z.infer<typeof referenceSampleSchema>;

const referenceCorpusSchema = z.object({
  samples: z.array(referenceSampleSchema).min(1),
});

/**
 * Load the bundled labelled samples from data/reference-corpus.json
 */
export function loadReferenceSamples(): ReferenceSample[] {
  const result = referenceCorpusSchema.safeParse(readDataFile('reference-corpus.json'));
  if (!result.success) {
    const issues = result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Reference corpus validation failed:\n${issues}`);
  }
  return result.data.samples;
}

export interface ReferenceCollaboratorOptions {
  samples?: ReferenceSample[];
  dimension?: number;
  securityRules?: SecurityRule[];
  /** Neighbours consulted by the quality model */
  k?: number;
  logger?: Logger;
}

/**
 * Wire the bundled analyzers into a full collaborator set.
 *
 * Every sample is embedded once; the same vectors seed the anomaly
 * reference set and the quality model.
 *
 * @throws ConfigurationError if a sample does not parse cleanly or the
 *   ensemble names an unknown detector
 */
export async function createReferenceCollaborators(
  config: VerdictConfig,
  options: ReferenceCollaboratorOptions = {},
): Promise<Collaborators> {
  const samples = options.samples ?? loadReferenceSamples();
  const embedder = new FeatureHashEmbedder(options.dimension ?? DEFAULT_EMBEDDING_DIMENSION);

  const parser = createPythonParser();
  samples.forEach((sample, index) => {
    const error = findSyntaxError(parser.parse(sample.code).rootNode);
    if (error !== null) {
      throw new ConfigurationError(`Reference sample ${index} is not valid source: ${error.message}`);
    }
  });

  const embeddings = await Promise.all(samples.map((sample) => embedder.embed(sample.code)));

  const reference = new ReferenceSet(embeddings);
  const ensemble = createEnsemble(createDefaultRegistry(reference), config.ensemble, options.logger);
  const qualityModel = new NearestNeighborQualityModel(
    embeddings.map((embedding, index) => ({
      embedding,
      quality: samples[index].quality,
      label: samples[index].name ?? `sample ${index}`,
    })),
    { k: options.k, matchSimilarity: config.review.referenceMatchSimilarity },
  );

  options.logger?.info(
    { samples: samples.length, dimension: embedder.dimension, detectors: ensemble.getMembers().map((m) => m.config.id) },
    'Reference collaborators ready',
  );

  return {
    structure: new TreeSitterStructureAnalyzer(),
    security: new PatternSecurityScanner(options.securityRules),
    embedder,
    qualityModel,
    ensemble,
    reviewer: new RuleBasedReviewer(config.review),
  };
}
