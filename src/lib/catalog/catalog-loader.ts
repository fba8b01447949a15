/**
 * Catalog Loader
 * Finds, parses and validates YAML criteria catalogs
 */

import { readdir, readFile } from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { env } from '../../config/env';
import { CatalogError, errorMessage } from '../errors';
import { CriterionDefinition, PATTERN_TYPES } from '../evaluation';
import { CatalogInfo, catalogSchema, CriteriaCatalog } from './catalog.schema';

const CATALOG_EXTENSIONS = ['.yaml', '.yml'];

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'catalog'}: ${issue.message}`).join('; ');
}

function isKnownPatternType(type: string): boolean {
  return PATTERN_TYPES.some((known) => known === type);
}

export class CatalogLoader {
  readonly directory: string;

  constructor(directory: string = env.CATALOG_DIR) {
    this.directory = path.resolve(directory);
  }

  /**
   * Catalog names (file names without extension), sorted
   */
  async listCatalogs(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch (error) {
      console.warn(`[Catalog] Cannot read catalog directory ${this.directory}: ${errorMessage(error)}`);
      return [];
    }

    const names = files
      .filter((file) => CATALOG_EXTENSIONS.includes(path.extname(file)))
      .map((file) => path.basename(file, path.extname(file)));

    return [...new Set(names)].sort();
  }

  async loadCatalog(name: string): Promise<CriteriaCatalog> {
    const source = await this.readCatalogFile(name);

    let document: unknown;
    try {
      document = yaml.load(source);
    } catch (error) {
      throw new CatalogError(`Catalog '${name}' is not valid YAML: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = catalogSchema.safeParse(document);
    if (!parsed.success) {
      throw new CatalogError(`Catalog '${name}' is invalid: ${describeIssues(parsed.error)}`);
    }

    const catalog = parsed.data;
    for (const dimension of Object.values(catalog.dimensions)) {
      for (const factor of Object.values(dimension.factors)) {
        for (const [criterionId, criterion] of Object.entries(factor.criteria)) {
          for (const patternType of Object.keys(criterion.patterns)) {
            if (!isKnownPatternType(patternType)) {
              console.warn(`[Catalog] Unknown pattern type '${patternType}' in criterion '${criterionId}'`);
            }
          }
        }
      }
    }

    console.log(`[Catalog] Loaded '${name}' with ${countCriteria(catalog)} criteria`);
    return catalog;
  }

  async getCatalogInfo(name: string): Promise<CatalogInfo> {
    const catalog = await this.loadCatalog(name);
    return {
      id: name,
      name: catalog.metadata.name,
      description: catalog.metadata.description ?? '',
      version: catalog.metadata.version ?? '1.0',
      organizationType: catalog.metadata.organization_type,
      dimensions: Object.keys(catalog.dimensions).length,
      totalCriteria: countCriteria(catalog),
    };
  }

  private async readCatalogFile(name: string): Promise<string> {
    if (name !== path.basename(name)) {
      throw new CatalogError(`Invalid catalog name '${name}'`);
    }

    for (const extension of CATALOG_EXTENSIONS) {
      try {
        return await readFile(path.join(this.directory, `${name}${extension}`), 'utf-8');
      } catch (error) {
        if (!isMissingFile(error)) {
          throw new CatalogError(`Catalog '${name}' could not be read: ${errorMessage(error)}`, { cause: error });
        }
      }
    }

    throw new CatalogError(`Catalog '${name}' not found in ${this.directory}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function countCriteria(catalog: CriteriaCatalog): number {
  let total = 0;
  for (const dimension of Object.values(catalog.dimensions)) {
    for (const factor of Object.values(dimension.factors)) {
      total += Object.keys(factor.criteria).length;
    }
  }
  return total;
}

/**
 * Criteria in catalog order with their dimension and factor names
 */
export function flattenCatalog(catalog: CriteriaCatalog, defaultThreshold?: number): CriterionDefinition[] {
  const criteria: CriterionDefinition[] = [];

  for (const [dimensionId, dimension] of Object.entries(catalog.dimensions)) {
    for (const [factorId, factor] of Object.entries(dimension.factors)) {
      for (const [criterionId, criterion] of Object.entries(factor.criteria)) {
        criteria.push({
          id: criterionId,
          dimension: dimension.name ?? dimensionId,
          factor: factor.name ?? factorId,
          name: criterion.name,
          description: criterion.description,
          type: criterion.type,
          patterns: criterion.patterns,
          weight: criterion.weight,
          confidenceThreshold: criterion.confidence_threshold ?? defaultThreshold,
        });
      }
    }
  }

  return criteria;
}
