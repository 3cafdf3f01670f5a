/**
 * MockModelBackend - Mock backend for testing
 *
 * Provides predictable responses for testing without hitting real APIs.
 */

import type { ChatRequest, ChatResponse, ModelBackend, ToolCall } from './types';

export type MockResponse = ChatResponse;

export class MockModelBackend implements ModelBackend {
  totalApiCalls = 0;

  /** Every request received, in order. Messages are copied at call time. */
  readonly requests: ChatRequest[] = [];

  private responses: MockResponse[];
  private responseIndex = 0;
  private defaultResponse: MockResponse;

  /**
   * Create a mock backend with predefined responses.
   *
   * @param responses - Array of responses to return in order
   * @param defaultResponse - Response to use when responses are exhausted
   */
  constructor(
    responses: MockResponse[] = [],
    defaultResponse: MockResponse = { content: 'mock response', toolCalls: [] }
  ) {
    this.responses = responses;
    this.defaultResponse = defaultResponse;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    this.totalApiCalls++;
    this.requests.push({ ...request, messages: [...request.messages] });

    if (this.responseIndex < this.responses.length) {
      return this.responses[this.responseIndex++];
    }

    return this.defaultResponse;
  }

  /**
   * Reset the response index to start from the beginning.
   */
  reset(): void {
    this.responseIndex = 0;
    this.totalApiCalls = 0;
    this.requests.length = 0;
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responses.push(...responses);
  }
}

export function textResponse(content: string): MockResponse {
  return { content, toolCalls: [] };
}

export function toolCallResponse(...toolCalls: ToolCall[]): MockResponse {
  return { toolCalls };
}
