import { readFile } from 'fs/promises';
import { resolve } from 'path';
import type { JSONSchema7 } from 'json-schema';
import { errorMessage } from '../errors';
import type { JsonValue } from '../values';
import { failure, stringArg, success, type Tool, type ToolExecution } from './types';

export class ReadFileTool implements Tool {
  readonly name = 'read_file';
  readonly description = 'Read contents of a file';

  constructor(private baseDir: string = process.cwd()) {}

  parametersSchema(): JSONSchema7 {
    return {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path to the file' },
      },
      required: ['path'],
    };
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    const path = stringArg(args, 'path');
    if (path === undefined) return failure('Missing required parameter: path');

    try {
      return success(await readFile(resolve(this.baseDir, path), 'utf-8'));
    } catch (err) {
      return failure(`Failed to read file '${path}': ${errorMessage(err)}`);
    }
  }
}
