/**
 * Completion judgment types
 */

/**
 * When a criterion counts towards completion.
 *
 * - `always`: applicable to every task
 * - `when_mentioned`: applicable when one of its triggers appears in the request
 * - `never`: optional; adds score when satisfied, never reported missing
 */
export type CriterionRequirement = 'always' | 'when_mentioned' | 'never';

export interface CompletionCriterion {
  id: string;
  /** Result category label, e.g. "design produced" */
  label: string;
  /** Relative weight; 0 marks a required-but-unweighted category */
  weight: number;
  required: CriterionRequirement;
  /** Request keywords that make a `when_mentioned` criterion applicable */
  triggers?: string[];
  satisfiedBy: {
    /** Any successful execution of one of these tools satisfies the criterion */
    tools?: string[];
    /** Any successful result or final answer containing one of these keywords */
    keywords?: string[];
  };
  /** Capability tags of agents able to satisfy this criterion */
  capabilities?: string[];
  /** Text appended to missing requirements when unsatisfied */
  missingMessage?: string;
}

export type QualityAssessment = 'excellent' | 'good' | 'fair' | 'poor';

export interface CriterionOutcome {
  id: string;
  label: string;
  applicable: boolean;
  required: boolean;
  satisfied: boolean;
  weight: number;
  /** Weight this criterion contributes to the score (0 when unsatisfied) */
  contribution: number;
  /** Short description of the evidence that satisfied the criterion */
  evidence: string | null;
}

export interface CompletionEvaluation {
  /** 0-100 */
  score: number;
  missingRequirements: string[];
  isCompleted: boolean;
  qualityAssessment: QualityAssessment;
  criteria: CriterionOutcome[];
  /** Capability tags of criteria still missing, in criterion order */
  missingCapabilities: string[];
}
