import { describe, it, expect } from 'vitest'
import { MockModelBackend, textResponse, toolCallResponse } from '../../src/llm/mock'
import type { ChatRequest } from '../../src/llm/types'
import { toolCall } from '../fixtures/helpers'

const request: ChatRequest = { messages: [{ role: 'user', content: 'hi' }], tools: [], jsonMode: false }

describe('MockModelBackend', () => {
  it('should return responses in order, then the default', async () => {
    const backend = new MockModelBackend([textResponse('one'), toolCallResponse(toolCall('search'))])

    expect(await backend.chat(request)).toEqual({ content: 'one', toolCalls: [] })
    expect(await backend.chat(request)).toEqual({
      toolCalls: [{ id: 'call_search', name: 'search', arguments: {} }]
    })
    expect(await backend.chat(request)).toEqual({ content: 'mock response', toolCalls: [] })
    expect(backend.totalApiCalls).toBe(3)
  })

  it('should record copies of the transcript', async () => {
    const backend = new MockModelBackend()
    const messages: ChatRequest['messages'] = [{ role: 'user', content: 'first' }]

    await backend.chat({ ...request, messages })
    messages.push({ role: 'assistant', content: 'later' })

    expect(backend.requests[0].messages).toEqual([{ role: 'user', content: 'first' }])
  })

  it('should start over after reset', async () => {
    const backend = new MockModelBackend([textResponse('again')])
    await backend.chat(request)
    backend.reset()

    expect(await backend.chat(request)).toEqual({ content: 'again', toolCalls: [] })
    expect(backend.totalApiCalls).toBe(1)
    expect(backend.requests).toHaveLength(1)
  })

  it('should queue added responses', async () => {
    const backend = new MockModelBackend([], textResponse('fallback'))
    backend.addResponses([textResponse('queued')])

    expect((await backend.chat(request)).content).toBe('queued')
    expect((await backend.chat(request)).content).toBe('fallback')
  })
})
