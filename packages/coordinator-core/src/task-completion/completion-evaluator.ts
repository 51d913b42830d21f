/**
 * CompletionEvaluator
 *
 * Deterministic completion judgment: weighted coverage of the criteria that
 * apply to a request, computed from the task's successful tool executions
 * and the agents' final answers.
 *
 * A task is complete only when the score reaches the threshold AND nothing
 * required is missing. A zero-weight criterion therefore blocks completion
 * without affecting the score.
 */

import type {
  CompletionCriterion,
  CompletionEvaluation,
  CriterionOutcome,
  QualityAssessment,
  ToolExecutionRecord,
} from '@taskloom/coordinator-contracts';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EvaluationInput {
  request: string;
  executions: readonly ToolExecutionRecord[];
  /** Final natural-language answers given by agents */
  answers?: readonly string[];
}

export interface CompletionEvaluatorOptions {
  criteria?: readonly CompletionCriterion[];
  /** 0-100, default 80 */
  threshold?: number;
}

export const NO_EVIDENCE_MESSAGE = 'No results have been produced yet';

interface EvidenceItem {
  source: string;
  text: string;
}

// ---------------------------------------------------------------------------
// CompletionEvaluator
// ---------------------------------------------------------------------------

export class CompletionEvaluator {
  private readonly criteria: readonly CompletionCriterion[];
  private readonly threshold: number;

  constructor(options: CompletionEvaluatorOptions = {}) {
    this.criteria = options.criteria ?? [];
    this.threshold = options.threshold ?? 80;
  }

  evaluate(input: EvaluationInput, criteria: readonly CompletionCriterion[] = this.criteria): CompletionEvaluation {
    const successes = input.executions.filter((record) => record.success);
    const answers = (input.answers ?? []).filter((answer) => answer.trim().length > 0);
    const evidence: EvidenceItem[] = [
      ...successes.map((record) => ({ source: `result of ${record.toolName}`, text: resultText(record) })),
      ...answers.map((answer) => ({ source: 'final answer', text: answer.toLowerCase() })),
    ];
    const hasEvidence = evidence.length > 0;
    const request = input.request.toLowerCase();

    const outcomes = criteria.map((criterion) => judge(criterion, request, successes, evidence));

    let denominator = 0;
    let numerator = 0;
    for (const outcome of outcomes) {
      if (outcome.applicable || outcome.satisfied) {
        denominator += outcome.weight;
        numerator += outcome.contribution;
      }
    }
    const score = denominator === 0 ? (hasEvidence ? 100 : 0) : Math.round((100 * numerator) / denominator);

    const missingRequirements: string[] = hasEvidence ? [] : [NO_EVIDENCE_MESSAGE];
    const missingCapabilities = new Set<string>();
    criteria.forEach((criterion, i) => {
      const outcome = outcomes[i];
      if (!outcome || !outcome.required || outcome.satisfied) {
        return;
      }
      missingRequirements.push(criterion.missingMessage ?? `Missing required result: ${criterion.label}`);
      for (const capability of criterion.capabilities ?? []) {
        missingCapabilities.add(capability);
      }
    });

    const isCompleted = score >= this.threshold && missingRequirements.length === 0;

    return {
      score,
      missingRequirements,
      isCompleted,
      qualityAssessment: assessQuality(score, isCompleted),
      criteria: outcomes,
      missingCapabilities: [...missingCapabilities],
    };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function judge(
  criterion: CompletionCriterion,
  request: string,
  successes: readonly ToolExecutionRecord[],
  evidence: readonly EvidenceItem[],
): CriterionOutcome {
  const applicable = isApplicable(criterion, request);
  const found = findEvidence(criterion, successes, evidence);
  const satisfied = found !== null;
  return {
    id: criterion.id,
    label: criterion.label,
    applicable,
    required: applicable,
    satisfied,
    weight: criterion.weight,
    contribution: satisfied ? criterion.weight : 0,
    evidence: found,
  };
}

function isApplicable(criterion: CompletionCriterion, request: string): boolean {
  switch (criterion.required) {
    case 'always':
      return true;
    case 'when_mentioned':
      return (criterion.triggers ?? []).some((trigger) => request.includes(trigger.toLowerCase()));
    case 'never':
      return false;
  }
}

function findEvidence(
  criterion: CompletionCriterion,
  successes: readonly ToolExecutionRecord[],
  evidence: readonly EvidenceItem[],
): string | null {
  const tools = criterion.satisfiedBy.tools ?? [];
  const byTool = successes.find((record) => tools.includes(record.toolName));
  if (byTool) {
    return `tool ${byTool.toolName} succeeded (${byTool.recordId})`;
  }

  for (const keyword of criterion.satisfiedBy.keywords ?? []) {
    const needle = keyword.toLowerCase();
    const hit = evidence.find((item) => item.text.includes(needle));
    if (hit) {
      return `keyword "${keyword}" in ${hit.source}`;
    }
  }
  return null;
}

function resultText(record: ToolExecutionRecord): string {
  if (!record.success) {
    return '';
  }
  if (typeof record.result === 'string') {
    return record.result.toLowerCase();
  }
  try {
    return (JSON.stringify(record.result) ?? '').toLowerCase();
  } catch {
    return String(record.result).toLowerCase();
  }
}

export function assessQuality(score: number, isCompleted: boolean): QualityAssessment {
  if (isCompleted) {
    return 'excellent';
  }
  if (score >= 60) {
    return 'good';
  }
  if (score >= 40) {
    return 'fair';
  }
  return 'poor';
}
