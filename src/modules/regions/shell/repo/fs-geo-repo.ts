import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { describeCause, formatSchemaErrors, type RegionsError } from '../../core/errors.js';
import { GeoFeatureCollectionSchema, type GeoFeatureCollection } from '../../core/types.js';

import type { GeoReferenceRepo } from '../../core/ports.js';

const validator = TypeCompiler.Compile(GeoFeatureCollectionSchema);

export interface FileGeoReferenceRepoOptions {
  /** Path to a GeoJSON FeatureCollection */
  filePath: string;
}

/**
 * Reads a file as UTF-8, mapping filesystem failures to repository errors.
 */
export const readTextFile = async (filePath: string): Promise<Result<string, RegionsError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `File not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read file at ${filePath}: ${describeCause(error)}`,
    });
  }
};

export const createFileGeoReferenceRepo = (
  options: FileGeoReferenceRepoOptions
): GeoReferenceRepo => ({
  async load(): Promise<Result<GeoFeatureCollection, RegionsError>> {
    const contents = await readTextFile(options.filePath);
    if (contents.isErr()) {
      return err(contents.error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents.value);
    } catch (error) {
      return err({
        type: 'ParseError',
        message: `Failed to parse GeoJSON at ${options.filePath}: ${describeCause(error)}`,
      });
    }

    if (!validator.Check(parsed)) {
      return err({
        type: 'SchemaValidationError',
        message: `GeoJSON at ${options.filePath} is not a FeatureCollection`,
        details: formatSchemaErrors(validator.Errors(parsed)),
      });
    }

    return ok(parsed);
  },
});
