import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../../utils/errors.js';
import { JsonRequirementCatalog } from '../JsonRequirementCatalog.js';

const bundledCatalog = fileURLToPath(new URL('../../../../data/frameworks/dpdp-2023.json', import.meta.url));

describe('JsonRequirementCatalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'catalog-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled framework in file order', async () => {
    const catalog = new JsonRequirementCatalog(bundledCatalog);

    const framework = await catalog.getFramework();
    const requirements = await catalog.listRequirements();

    expect(framework).toEqual({
      frameworkId: 'dpdp-2023',
      name: 'Digital Personal Data Protection Act',
      version: '2023',
      effectiveDate: '2023-08-11',
    });
    expect(requirements).toHaveLength(10);
    expect(requirements[0]).toMatchObject({ requirementId: 'DPDP-4', sectionRef: 'Section 4', riskLevel: 'HIGH' });
  });

  it('applies defaults for optional requirement fields', async () => {
    const path = join(dir, 'minimal.json');
    await writeFile(
      path,
      JSON.stringify({ frameworkId: 'mini', requirements: [{ requirementId: 'M-1', title: 'Notice', text: 'Give notice.' }] })
    );

    const catalog = new JsonRequirementCatalog(path);

    expect(await catalog.getFramework()).toEqual({ frameworkId: 'mini', name: null, version: null, effectiveDate: null });
    expect(await catalog.listRequirements()).toEqual([
      { requirementId: 'M-1', title: 'Notice', text: 'Give notice.', sectionRef: '', riskLevel: 'MEDIUM' },
    ]);
  });

  it('rejects duplicate requirement ids', async () => {
    const path = join(dir, 'duplicate.json');
    const requirement = { requirementId: 'D-1', title: 'Consent', text: 'Obtain consent.' };
    await writeFile(path, JSON.stringify({ frameworkId: 'dup', requirements: [requirement, requirement] }));

    await expect(new JsonRequirementCatalog(path).listRequirements()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('reports a missing file as a configuration error', async () => {
    const path = join(dir, 'absent.json');

    await expect(new JsonRequirementCatalog(path).getFramework()).rejects.toThrow(
      `Requirement catalog could not be loaded from ${path}`
    );
  });

  it('hands out copies of the requirement list', async () => {
    const catalog = new JsonRequirementCatalog(bundledCatalog);

    const first = await catalog.listRequirements();
    first.pop();

    expect(await catalog.listRequirements()).toHaveLength(10);
    expect(Object.isFrozen(first[0])).toBe(true);
  });
});
