import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import type { JSONSchema7 } from 'json-schema';
import { errorMessage } from '../errors';
import type { JsonValue } from '../values';
import { failure, stringArg, success, type Tool, type ToolExecution } from './types';

export class WriteFileTool implements Tool {
  readonly name = 'write_file';
  readonly description = 'Write content to a file';

  constructor(private baseDir: string = process.cwd()) {}

  parametersSchema(): JSONSchema7 {
    return {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path to the file' },
        content: { type: 'string', description: 'Content to write' },
      },
      required: ['path', 'content'],
    };
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    const path = stringArg(args, 'path');
    if (path === undefined) return failure('Missing required parameter: path');
    const content = stringArg(args, 'content');
    if (content === undefined) return failure('Missing required parameter: content');

    const target = resolve(this.baseDir, path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
    } catch (err) {
      return failure(`Failed to write file '${path}': ${errorMessage(err)}`);
    }
    return success(`Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${path}`);
  }
}
