import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { readTextFile } from './fs-geo-repo.js';
import { describeCause, formatSchemaErrors, type RegionsError } from '../../core/errors.js';
import { RegionAliasFileSchema, type RegionAliasFile } from '../../core/types.js';

import type { RegionAliasSource } from '../../core/ports.js';

const validator = TypeCompiler.Compile(RegionAliasFileSchema);

export interface YamlRegionAliasSourceOptions {
  filePath: string;
}

export const createYamlRegionAliasSource = (
  options: YamlRegionAliasSourceOptions
): RegionAliasSource => ({
  async load(): Promise<Result<RegionAliasFile, RegionsError>> {
    const contents = await readTextFile(options.filePath);
    if (contents.isErr()) {
      return err(contents.error);
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(contents.value);
    } catch (error) {
      return err({
        type: 'ParseError',
        message: `Failed to parse YAML at ${options.filePath}: ${describeCause(error)}`,
      });
    }

    // An empty file parses to null and adds nothing
    if (parsed === null || parsed === undefined) {
      return ok({});
    }

    if (!validator.Check(parsed)) {
      return err({
        type: 'SchemaValidationError',
        message: `Schema validation failed for ${options.filePath}`,
        details: formatSchemaErrors(validator.Errors(parsed)),
      });
    }

    return ok(parsed);
  },
});
