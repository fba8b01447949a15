/**
 * Catalog Loader Tests
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CatalogLoader, countCriteria, flattenCatalog } from '..';
import { CatalogError } from '../../errors';

const VALID_CATALOG = `
metadata:
  name: "Testkatalog"
  organization_type: "vereine"
  version: 2.0
  created_date: 2026-01-15
dimensions:
  transparenz:
    name: "Transparenz"
    factors:
      finanzen:
        name: "Finanzen"
        criteria:
          jahresbericht:
            name: "Jahresbericht"
            description: "Jahresbericht online"
            type: "operational"
            patterns:
              text: ["jahresbericht"]
              url: ["bericht"]
            confidence_threshold: 0.3
          satzung:
            name: "Satzung"
            description: "Satzung online"
            type: "strategic"
  partizipation:
    factors:
      mitglieder:
        criteria:
          beitritt:
            name: "Beitritt"
            description: "Mitglied werden"
            type: "operational"
            weight: 2
            patterns:
              video: ["beitritt"]
`;

describe('CatalogLoader', () => {
  let directory: string;
  let loader: CatalogLoader;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'catalogs-'));
    loader = new CatalogLoader(directory);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  describe('listCatalogs', () => {
    it('should list yaml and yml files sorted without extension', async () => {
      await writeFile(path.join(directory, 'vereine.yaml'), VALID_CATALOG);
      await writeFile(path.join(directory, 'bibliotheken.yml'), VALID_CATALOG);
      await writeFile(path.join(directory, 'notizen.txt'), 'ignored');

      await expect(loader.listCatalogs()).resolves.toEqual(['bibliotheken', 'vereine']);
    });

    it('should return an empty list for a missing directory', async () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      await expect(new CatalogLoader(path.join(directory, 'fehlt')).listCatalogs()).resolves.toEqual([]);
    });
  });

  describe('loadCatalog', () => {
    it('should load and validate a catalog', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await writeFile(path.join(directory, 'vereine.yaml'), VALID_CATALOG);

      const catalog = await loader.loadCatalog('vereine');

      expect(catalog.metadata.name).toBe('Testkatalog');
      expect(catalog.metadata.version).toBe('2');
      expect(catalog.metadata.created_date).toBe('2026-01-15');
      expect(countCriteria(catalog)).toBe(3);
      expect(warn).toHaveBeenCalledWith("[Catalog] Unknown pattern type 'video' in criterion 'beitritt'");
    });

    it('should fall back to the .yml extension', async () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await writeFile(path.join(directory, 'vereine.yml'), VALID_CATALOG);

      await expect(loader.loadCatalog('vereine')).resolves.toHaveProperty('metadata.organization_type', 'vereine');
    });

    it('should reject a missing catalog', async () => {
      await expect(loader.loadCatalog('fehlt')).rejects.toThrow(`Catalog 'fehlt' not found in ${directory}`);
    });

    it('should reject names that leave the catalog directory', async () => {
      await expect(loader.loadCatalog('../vereine')).rejects.toThrow("Invalid catalog name '../vereine'");
    });

    it('should reject a criterion with an invalid type', async () => {
      await writeFile(
        path.join(directory, 'kaputt.yaml'),
        VALID_CATALOG.replace('type: "strategic"', 'type: "visionary"')
      );

      await expect(loader.loadCatalog('kaputt')).rejects.toThrow(
        "Catalog 'kaputt' is invalid: dimensions.transparenz.factors.finanzen.criteria.satzung.type: must be one of: operational, strategic"
      );
    });

    it('should reject metadata without an organization type', async () => {
      await writeFile(
        path.join(directory, 'kaputt.yaml'),
        VALID_CATALOG.replace('organization_type: "vereine"', '')
      );

      await expect(loader.loadCatalog('kaputt')).rejects.toBeInstanceOf(CatalogError);
    });

    it('should reject patterns that are not lists', async () => {
      await writeFile(
        path.join(directory, 'kaputt.yaml'),
        VALID_CATALOG.replace('url: ["bericht"]', 'url: "bericht"')
      );

      await expect(loader.loadCatalog('kaputt')).rejects.toThrow(
        "Catalog 'kaputt' is invalid: dimensions.transparenz.factors.finanzen.criteria.jahresbericht.patterns.url: must be a list of strings"
      );
    });

    it('should reject malformed YAML', async () => {
      await writeFile(path.join(directory, 'kaputt.yaml'), 'metadata: [unclosed');

      await expect(loader.loadCatalog('kaputt')).rejects.toThrow("Catalog 'kaputt' is not valid YAML");
    });
  });

  describe('getCatalogInfo', () => {
    it('should summarize a catalog', async () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await writeFile(path.join(directory, 'vereine.yaml'), VALID_CATALOG);

      await expect(loader.getCatalogInfo('vereine')).resolves.toEqual({
        id: 'vereine',
        name: 'Testkatalog',
        description: '',
        version: '2',
        organizationType: 'vereine',
        dimensions: 2,
        totalCriteria: 3,
      });
    });
  });

  describe('flattenCatalog', () => {
    it('should flatten criteria in catalog order with their context', async () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      await writeFile(path.join(directory, 'vereine.yaml'), VALID_CATALOG);
      const catalog = await loader.loadCatalog('vereine');

      const criteria = flattenCatalog(catalog, 0.5);

      expect(criteria).toEqual([
        {
          id: 'jahresbericht',
          dimension: 'Transparenz',
          factor: 'Finanzen',
          name: 'Jahresbericht',
          description: 'Jahresbericht online',
          type: 'operational',
          patterns: { text: ['jahresbericht'], url: ['bericht'] },
          weight: 1,
          confidenceThreshold: 0.3,
        },
        {
          id: 'satzung',
          dimension: 'Transparenz',
          factor: 'Finanzen',
          name: 'Satzung',
          description: 'Satzung online',
          type: 'strategic',
          patterns: {},
          weight: 1,
          confidenceThreshold: 0.5,
        },
        {
          id: 'beitritt',
          dimension: 'partizipation',
          factor: 'mitglieder',
          name: 'Beitritt',
          description: 'Mitglied werden',
          type: 'operational',
          patterns: { video: ['beitritt'] },
          weight: 2,
          confidenceThreshold: 0.5,
        },
      ]);
    });
  });

  it('should load the bundled catalog', async () => {
    const bundled = new CatalogLoader(path.resolve(__dirname, '../../../../criteria'));

    const info = await bundled.getCatalogInfo('vereine');

    expect(info.organizationType).toBe('vereine');
    expect(info.dimensions).toBe(3);
    expect(info.totalCriteria).toBe(12);
  });
});
