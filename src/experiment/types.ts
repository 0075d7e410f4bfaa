/**
 * A/B Testing Types
 */

export interface ExperimentVariant {
  name: string;
  /** Relative weight; a variant's share is weight / sum(weights) */
  weight: number;
}

export interface ExperimentDefinition {
  name: string;
  description?: string;
  variants: ExperimentVariant[];
}

export interface ExperimentAssignment {
  experiment: string;
  subjectId: string;
  variant: string;
}

/** Built-in experiment comparing the AI path with the rule-based path */
export const AI_VS_RULES_EXPERIMENT = 'ai_vs_rules';

export type AiVsRulesVariant = 'ai' | 'rules';

const AI_VS_RULES_VARIANTS: readonly string[] = ['ai', 'rules'] satisfies readonly AiVsRulesVariant[];

export function isAiVsRulesVariant(name: string): name is AiVsRulesVariant {
  return AI_VS_RULES_VARIANTS.includes(name);
}
