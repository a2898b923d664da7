import type {
  AgentExecutionTrace,
  ExecutionTrace,
  RequirementEvaluationTrace,
} from '../../domain/schemas/trace.schema.js';
import type { LatencyTracker } from './LatencyTracker.js';

const MAX_INLINE_STRING = 100;

/**
 * Replaces bulky values with a short description so traces stay small:
 * arrays become `<list of N items>` and long strings `<string of N chars>`.
 */
export function summarizeData(data: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, summarizeValue(value)]));
}

function summarizeValue(value: unknown): unknown {
  if (Array.isArray(value)) return `<list of ${value.length} items>`;
  if (typeof value === 'string' && value.length > MAX_INLINE_STRING) {
    return `<string of ${value.length} chars>`;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, member]) => [key, summarizeValue(member)]));
  }
  return value;
}

export interface AgentExecutionInput {
  agentName: string;
  startedAt: Date;
  durationMs: number;
  input: Record<string, unknown>;
  output: Record<string, unknown>;
  error?: string;
}

export type RequirementEvaluationInput = Omit<RequirementEvaluationTrace, 'wasDowngraded'>;

/**
 * Collects one audit run's trace. Entries are keyed by agent name or
 * requirement id, so concurrent requirement chains never share a slot.
 */
export class ExecutionTracer {
  private readonly agents = new Map<string, AgentExecutionTrace>();
  private readonly evaluations = new Map<string, RequirementEvaluationTrace>();

  constructor(
    private readonly latency: LatencyTracker,
    private readonly clock: () => Date = () => new Date()
  ) {}

  recordAgentExecution(execution: AgentExecutionInput): AgentExecutionTrace {
    const trace: AgentExecutionTrace = {
      agentName: execution.agentName,
      startedAt: execution.startedAt.toISOString(),
      durationMs: execution.durationMs,
      inputSummary: summarizeData(execution.input),
      outputSummary: summarizeData(execution.output),
      success: execution.error === undefined,
      error: execution.error ?? null,
    };
    this.agents.set(execution.agentName, trace);
    return trace;
  }

  recordRequirementEvaluation(evaluation: RequirementEvaluationInput): RequirementEvaluationTrace {
    const trace: RequirementEvaluationTrace = {
      ...evaluation,
      wasDowngraded:
        evaluation.finalStatus !== evaluation.assessmentStatus ||
        evaluation.finalConfidence < evaluation.assessmentConfidence,
    };
    this.evaluations.set(evaluation.requirementId, trace);
    return trace;
  }

  getRequirementEvaluation(requirementId: string): RequirementEvaluationTrace | undefined {
    return this.evaluations.get(requirementId);
  }

  getFullTrace(): ExecutionTrace {
    return {
      agents: Object.fromEntries(this.agents),
      requirementEvaluations: Object.fromEntries(this.evaluations),
      latencies: this.latency.getAll(),
      capturedAt: this.clock().toISOString(),
    };
  }
}
