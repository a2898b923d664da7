import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import { RISK_LEVELS, type Requirement, type RiskLevel } from '../../domain/entities/Requirement.js';
import { GraphPersistenceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Neo4jClient } from '../graph/Neo4jClient.js';
import { nodeProperties, toNullableString, toStringValue } from '../graph/values.js';
import type { RequirementCatalog } from './RequirementCatalog.interface.js';

const toRiskLevel = (value: unknown): RiskLevel =>
  RISK_LEVELS.find(level => level === value) ?? 'MEDIUM';

/** Reads `(:Framework)-[:HAS_REQUIREMENT]->(:Requirement)` seeded by an external process. */
export class Neo4jRequirementCatalog implements RequirementCatalog {
  constructor(
    private readonly client: Neo4jClient,
    private readonly frameworkId: string
  ) {}

  async getFramework(): Promise<FrameworkMetadata> {
    try {
      const result = await this.client.run('MATCH (f:Framework {frameworkId: $frameworkId}) RETURN f', {
        frameworkId: this.frameworkId,
      });
      const props = nodeProperties(result.records[0]?.get('f'));
      return {
        frameworkId: this.frameworkId,
        name: toNullableString(props.name),
        version: toNullableString(props.version),
        effectiveDate: toNullableString(props.effectiveDate),
      };
    } catch (error) {
      logger.error({ error, frameworkId: this.frameworkId }, 'Failed to read framework');
      throw new GraphPersistenceError('Framework lookup failed', error);
    }
  }

  async listRequirements(): Promise<Requirement[]> {
    try {
      const result = await this.client.run(
        `
        MATCH (:Framework {frameworkId: $frameworkId})-[:HAS_REQUIREMENT]->(r:Requirement)
        RETURN r
        ORDER BY r.requirementId ASC
      `,
        { frameworkId: this.frameworkId }
      );

      return result.records.map(record => {
        const props = nodeProperties(record.get('r'));
        return {
          requirementId: toStringValue(props.requirementId),
          title: toStringValue(props.title),
          text: toStringValue(props.text),
          sectionRef: toStringValue(props.sectionRef),
          riskLevel: toRiskLevel(props.riskLevel),
        };
      });
    } catch (error) {
      logger.error({ error, frameworkId: this.frameworkId }, 'Failed to read requirements');
      throw new GraphPersistenceError('Requirement lookup failed', error);
    }
  }
}
