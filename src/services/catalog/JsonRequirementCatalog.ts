import { readFile } from 'fs/promises';
import { ZodError } from 'zod';
import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { frameworkFileSchema } from './catalog.schema.js';
import type { RequirementCatalog } from './RequirementCatalog.interface.js';
import { StaticRequirementCatalog } from './StaticRequirementCatalog.js';

/** Framework definition read once from a JSON file. */
export class JsonRequirementCatalog implements RequirementCatalog {
  private loaded: Promise<StaticRequirementCatalog> | null = null;

  constructor(private readonly filePath: string) {}

  async getFramework(): Promise<FrameworkMetadata> {
    return (await this.load()).getFramework();
  }

  async listRequirements(): Promise<Requirement[]> {
    return (await this.load()).listRequirements();
  }

  private load(): Promise<StaticRequirementCatalog> {
    if (!this.loaded) {
      this.loaded = this.read().catch((error: unknown) => {
        this.loaded = null;
        throw error;
      });
    }
    return this.loaded;
  }

  private async read(): Promise<StaticRequirementCatalog> {
    try {
      const content = await readFile(this.filePath, 'utf-8');
      const { requirements, ...framework } = frameworkFileSchema.parse(JSON.parse(content));
      logger.info(
        { frameworkId: framework.frameworkId, requirements: requirements.length, path: this.filePath },
        'Requirement catalog loaded'
      );
      return new StaticRequirementCatalog(framework, requirements);
    } catch (error) {
      logger.error({ error, path: this.filePath }, 'Failed to load requirement catalog');
      const detail = error instanceof ZodError ? error.issues : error;
      throw new ConfigurationError(`Requirement catalog could not be loaded from ${this.filePath}`, detail);
    }
  }
}
