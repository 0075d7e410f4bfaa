/**
 * Experiment Router
 *
 * Stateless hash-based assignment: the same (experiment, subject) pair
 * always lands on the same variant for a given weight configuration, so no
 * assignment table is kept.
 */

import { createHash } from 'crypto';
import { ExperimentDefinition, ExperimentAssignment } from './types';
import { ConfigurationError } from '../gateway/errors';
import { logger } from '../observability/logger';

interface CompiledExperiment {
  definition: ExperimentDefinition;
  totalWeight: number;
}

export class ExperimentRouter {
  private readonly experiments = new Map<string, CompiledExperiment>();
  private readonly log = logger.child({ component: 'experiment-router' });

  constructor(definitions: ExperimentDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  /** Register an experiment; rejects malformed weight tables */
  register(definition: ExperimentDefinition): void {
    if (this.experiments.has(definition.name)) {
      throw new ConfigurationError(`Duplicate experiment: ${definition.name}`);
    }
    if (definition.variants.length === 0) {
      throw new ConfigurationError(`Experiment "${definition.name}" has no variants`);
    }

    const seen = new Set<string>();
    let totalWeight = 0;
    for (const variant of definition.variants) {
      if (seen.has(variant.name)) {
        throw new ConfigurationError(`Experiment "${definition.name}" repeats variant "${variant.name}"`);
      }
      if (!Number.isInteger(variant.weight) || variant.weight < 0) {
        throw new ConfigurationError(
          `Experiment "${definition.name}" variant "${variant.name}" needs a non-negative integer weight`,
        );
      }
      seen.add(variant.name);
      totalWeight += variant.weight;
    }
    if (totalWeight === 0) {
      throw new ConfigurationError(`Experiment "${definition.name}" weights sum to zero`);
    }

    this.experiments.set(definition.name, { definition, totalWeight });
    this.log.info(
      { experiment: definition.name, variants: definition.variants },
      'Experiment registered',
    );
  }

  has(name: string): boolean {
    return this.experiments.has(name);
  }

  list(): ExperimentDefinition[] {
    return Array.from(this.experiments.values(), (e) => e.definition);
  }

  /** Deterministically map a subject to a variant name */
  assign(experimentName: string, subjectId: string): string {
    const compiled = this.experiments.get(experimentName);
    if (!compiled) {
      throw new ConfigurationError(`Unknown experiment: ${experimentName}`);
    }

    const hash = createHash('sha256').update(JSON.stringify([experimentName, subjectId])).digest();
    const bucket = hash.readUInt32BE(0) % compiled.totalWeight;

    let cumWeight = 0;
    for (const variant of compiled.definition.variants) {
      cumWeight += variant.weight;
      if (bucket < cumWeight) return variant.name;
    }

    // Unreachable: bucket < totalWeight
    return compiled.definition.variants[compiled.definition.variants.length - 1].name;
  }

  assignment(experimentName: string, subjectId: string): ExperimentAssignment {
    return {
      experiment: experimentName,
      subjectId,
      variant: this.assign(experimentName, subjectId),
    };
  }
}

/**
 * Parse a weight list such as `ai:50,rules:50`.
 * Throws ConfigurationError on malformed entries.
 */
export function parseWeights(weights: string): Array<{ name: string; weight: number }> {
  const entries = weights.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  if (entries.length === 0) {
    throw new ConfigurationError('Experiment weights are empty');
  }
  return entries.map((entry) => {
    const [name, raw] = entry.split(':').map((s) => s.trim());
    const weight = Number(raw);
    if (!name || raw === undefined || raw === '' || !Number.isInteger(weight) || weight < 0) {
      throw new ConfigurationError(`Malformed experiment weight "${entry}" (expected name:integer)`);
    }
    return { name, weight };
  });
}
