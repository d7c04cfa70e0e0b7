import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';

import { OpenAIRoutingAdvisor, buildAdvicePrompt } from '../src/index';
import type { RoutingAdviceRequest } from '@weave/core';

const request: RoutingAdviceRequest = {
  workflowId: 'support',
  executionId: 'exec-1',
  currentNode: 'triage',
  stateSummary: { recentPath: ['intake', 'triage'], dataKeys: ['ticket'] },
  candidates: [
    { to: 'billing', strategy: 'ai_assisted', conditions: ['isBilling'], metadata: {}, score: 0.5 },
    { to: 'general', strategy: 'ai_assisted', conditions: [], metadata: {}, score: 0.25 }
  ]
};

describe('openai routing advisor', () => {
  it('describes the routing choice in the prompt', () => {
    expect(buildAdvicePrompt(request)).toBe([
      'Workflow: support',
      'Current node: triage',
      'Recent path: intake -> triage',
      'State keys: ticket',
      'Candidates:',
      '- billing (strategy=ai_assisted, score=0.500, conditions=isBilling)',
      '- general (strategy=ai_assisted, score=0.250, conditions=unconditional)'
    ].join('\n'));
  });

  it('requests structured output and returns the parsed advice', async () => {
    const create = vi.fn(async (_params: unknown, _options: unknown) => ({
      model: 'gpt-4o-mini',
      choices: [
        { message: { content: '{"recommendedNode":"billing","confidence":0.9,"reasoning":"invoice mentioned"}' } }
      ]
    }));

    const advisor = new OpenAIRoutingAdvisor({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      client: {
        chat: { completions: { create } }
      } as unknown as OpenAI
    });

    const controller = new AbortController();
    const advice = await advisor.recommend(request, controller.signal);

    expect(advice).toEqual({ recommendedNode: 'billing', confidence: 0.9, reasoning: 'invoice mentioned' });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      model: 'gpt-4o-mini',
      response_format: { type: 'json_schema' }
    });
    expect(create.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
  });

  it('rejects an empty completion', async () => {
    const create = vi.fn(async () => ({ choices: [{ message: { content: null } }] }));
    const advisor = new OpenAIRoutingAdvisor({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      client: { chat: { completions: { create } } } as unknown as OpenAI
    });

    await expect(advisor.recommend(request, new AbortController().signal))
      .rejects.toThrow('Routing advisor returned an empty response');
  });
});
