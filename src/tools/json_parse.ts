import type { JSONSchema7 } from 'json-schema';
import { errorMessage } from '../errors';
import type { JsonValue } from '../values';
import { failure, stringArg, success, type Tool, type ToolExecution } from './types';

export class JsonParseTool implements Tool {
  readonly name = 'json_parse';
  readonly description = 'Parse a JSON string into an object or array';

  parametersSchema(): JSONSchema7 {
    return {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'The JSON string to parse' },
      },
      required: ['text'],
    };
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    const text = stringArg(args, 'text');
    if (text === undefined) return failure('Missing required parameter: text');

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      return failure(`Failed to parse JSON: ${errorMessage(err)}`);
    }
    return success(JSON.stringify(parsed, null, 2));
  }
}
