import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import { deepFreeze } from '../../utils/freeze.js';
import type { RequirementCatalog } from './RequirementCatalog.interface.js';

export class StaticRequirementCatalog implements RequirementCatalog {
  private readonly framework: FrameworkMetadata;
  private readonly requirements: readonly Requirement[];

  constructor(framework: FrameworkMetadata, requirements: readonly Requirement[]) {
    this.framework = deepFreeze({ ...framework });
    this.requirements = deepFreeze(requirements.map(requirement => ({ ...requirement })));
  }

  async getFramework(): Promise<FrameworkMetadata> {
    return this.framework;
  }

  async listRequirements(): Promise<Requirement[]> {
    return [...this.requirements];
  }
}
