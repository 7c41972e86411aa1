import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { formatSchemaErrors } from '@/common/types/errors.js';

import type { CatalogError } from './errors.js';
import type { Static, TSchema } from '@sinclair/typebox';

export interface CatalogFileReader<S extends TSchema> {
  read(fileName: string): Promise<Result<Static<S>, CatalogError>>;
}

/**
 * Reads YAML catalog files from `rootDir` and validates them against a schema.
 */
export const makeCatalogFileReader = <S extends TSchema>(
  rootDir: string,
  schema: S
): CatalogFileReader<S> => {
  const validator = TypeCompiler.Compile(schema);

  return {
    async read(fileName) {
      const filePath = path.resolve(rootDir, fileName);

      let contents: string;
      try {
        contents = await fs.readFile(filePath, 'utf8');
      } catch (error) {
        return err({
          type: 'CatalogReadError',
          message: `Failed to read catalog file at ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          file: filePath,
        });
      }

      let parsed: unknown;
      try {
        parsed = parseYaml(contents);
      } catch (error) {
        return err({
          type: 'CatalogParseError',
          message: `Failed to parse YAML at ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          file: filePath,
        });
      }

      if (!validator.Check(parsed)) {
        const details = formatSchemaErrors(validator.Errors(parsed));
        return err({
          type: 'CatalogSchemaError',
          message: `Schema validation failed for ${filePath}`,
          file: filePath,
          details,
        });
      }

      return ok(parsed);
    },
  };
};
