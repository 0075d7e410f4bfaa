import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { ExperimentDefinition, AI_VS_RULES_EXPERIMENT, isAiVsRulesVariant } from '../experiment/types';
import { parseWeights } from '../experiment/experiment-router';
import { ConfigurationError } from '../gateway/errors';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_EXPERIMENTS_FILE = path.resolve(PROJECT_ROOT, 'config', 'experiments.yaml');

interface ExperimentsFile {
  experiments: ExperimentDefinition[];
}

const ajv = new Ajv({ allErrors: true });

const validateExperimentsFile = ajv.compile<ExperimentsFile>({
  type: 'object',
  required: ['experiments'],
  properties: {
    experiments: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'variants'],
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: 'string' },
          variants: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              required: ['name', 'weight'],
              properties: {
                name: { type: 'string', minLength: 1 },
                weight: { type: 'integer', minimum: 0 },
              },
              additionalProperties: false,
            },
          },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
});

/**
 * Load experiment definitions from YAML. A missing file yields an empty list;
 * a present but invalid file is a startup error.
 */
export function loadExperimentsFile(filepath: string = DEFAULT_EXPERIMENTS_FILE): ExperimentDefinition[] {
  if (!fs.existsSync(filepath)) {
    logger.warn({ filepath }, 'Experiments file not found; only built-in experiment is active');
    return [];
  }

  const parsed: unknown = yaml.load(fs.readFileSync(filepath, 'utf-8'));
  if (!validateExperimentsFile(parsed)) {
    const errors = validateExperimentsFile.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid experiments file ${filepath}: ${errors}`);
  }

  logger.info({ filepath, count: parsed.experiments.length }, 'Loaded experiments file');
  return parsed.experiments;
}

/**
 * Experiments for the process: the file's definitions, with the built-in
 * `ai_vs_rules` experiment taking its weights from EXPERIMENT_WEIGHTS.
 */
export function resolveExperiments(
  experimentWeights: string,
  fileExperiments: ExperimentDefinition[],
): ExperimentDefinition[] {
  const builtIn: ExperimentDefinition = {
    name: AI_VS_RULES_EXPERIMENT,
    description: 'AI-generated responses versus the deterministic rule-based path',
    variants: parseWeights(experimentWeights),
  };
  const unknownArms = builtIn.variants.filter((v) => !isAiVsRulesVariant(v.name));
  if (unknownArms.length > 0) {
    throw new ConfigurationError(
      `${AI_VS_RULES_EXPERIMENT} only supports variants "ai" and "rules", got: ${unknownArms.map((v) => v.name).join(', ')}`,
    );
  }

  return [builtIn, ...fileExperiments.filter((e) => e.name !== AI_VS_RULES_EXPERIMENT)];
}
