import type { FrameworkMetadata } from '../domain/entities/Framework.js';
import type { Requirement } from '../domain/entities/Requirement.js';
import type { Assessment } from '../domain/schemas/assessment.schema.js';
import type { EvidenceBundle, EvidenceSegment } from '../types/evidence.types.js';

export const testFramework: FrameworkMetadata = {
  frameworkId: 'test-framework',
  name: 'Test Privacy Act',
  version: '1.0',
  effectiveDate: '2024-01-01',
};

export function makeRequirement(overrides: Partial<Requirement> = {}): Requirement {
  return {
    requirementId: 'REQ-1',
    title: 'Consent before processing',
    text: 'Personal data may be processed only after obtaining explicit consent from the data principal.',
    sectionRef: 'Section 6',
    riskLevel: 'HIGH',
    ...overrides,
  };
}

export function makeAssessment(overrides: Partial<Assessment> = {}): Assessment {
  return {
    requirementId: 'REQ-1',
    status: 'COMPLIANT',
    confidence: 0.9,
    evidenceQuote: 'We obtain explicit consent before collecting personal data.',
    reasoning: 'The policy states that consent is obtained first.',
    pageNumbers: [1],
    ...overrides,
  };
}

export function makeBundle(
  requirementId: string,
  segments: Array<Partial<EvidenceSegment> & { text: string }>
): EvidenceBundle {
  return {
    requirementId,
    strategy: 'lexical',
    segments: segments.map((segment, index) => ({
      segmentId: `seg-${index}`,
      pages: [index + 1],
      score: 1,
      ...segment,
    })),
  };
}
