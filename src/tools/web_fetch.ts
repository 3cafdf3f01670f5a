import type { JSONSchema7 } from 'json-schema';
import { errorMessage } from '../errors';
import type { JsonValue } from '../values';
import { failure, stringArg, success, type Tool, type ToolExecution } from './types';

export interface WebFetchOptions {
  /** Response bodies longer than this many characters are cut. Default 100000. */
  maxBytes?: number;
}

export const DEFAULT_MAX_BYTES = 100_000;

export class WebFetchTool implements Tool {
  readonly name = 'web_fetch';
  readonly description = 'Fetch content from a URL. Returns the response body as text.';

  private maxBytes: number;

  constructor(options: WebFetchOptions = {}) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
  }

  parametersSchema(): JSONSchema7 {
    return {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'The URL to fetch' },
      },
      required: ['url'],
    };
  }

  async execute(args: JsonValue): Promise<ToolExecution> {
    const url = stringArg(args, 'url');
    if (url === undefined) return failure('Missing required parameter: url');

    let response: Response;
    try {
      response = await fetch(url);
    } catch (err) {
      return failure(`Request failed: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      return failure(`HTTP ${response.status}`);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      return failure(`Failed to read response: ${errorMessage(err)}`);
    }

    if (body.length > this.maxBytes) {
      return success(`${body.slice(0, this.maxBytes)}\n[truncated]`);
    }
    return success(body);
  }
}
