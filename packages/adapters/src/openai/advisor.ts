import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import { z } from 'zod';
import type { RoutingAdviceRequest, RoutingAdvisor } from '@weave/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

/** Structured outputs need every field present, so nothing here is optional. */
const AdviceResponseSchema = z.object({
    recommendedNode: z.string(),
    confidence: z.number(),
    reasoning: z.string()
});

const SYSTEM_PROMPT = [
    'You choose the next step of a running workflow.',
    'Pick exactly one candidate by its node id, using the recent path, the state keys and each candidate\'s score and conditions.',
    'Confidence is between 0 and 1.'
].join(' ');

export function buildAdvicePrompt(request: RoutingAdviceRequest): string {
    const lines = [
        `Workflow: ${request.workflowId}`,
        `Current node: ${request.currentNode}`,
        `Recent path: ${request.stateSummary.recentPath.join(' -> ') || '(none)'}`,
        `State keys: ${request.stateSummary.dataKeys.join(', ') || '(none)'}`,
        'Candidates:'
    ];

    for (const candidate of request.candidates) {
        const conditions = candidate.conditions.length > 0 ? candidate.conditions.join(', ') : 'unconditional';
        lines.push(`- ${candidate.to} (strategy=${candidate.strategy}, score=${candidate.score.toFixed(3)}, conditions=${conditions})`);
    }

    return lines.join('\n');
}

function toMessages(request: RoutingAdviceRequest): OpenAIMessage[] {
    return [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildAdvicePrompt(request) }
    ];
}

/**
 * Routing advisor backed by a chat completion with a JSON-schema response.
 * Whatever comes back is returned unvalidated; the router decides whether to
 * trust it.
 */
export class OpenAIRoutingAdvisor implements RoutingAdvisor {
    private client: OpenAI;

    public constructor(private readonly opts: {
        baseUrl?: string;
        apiKey: string;
        model: string;
        client?: OpenAI;
    }) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey
        });
    }

    public async recommend(request: RoutingAdviceRequest, signal: AbortSignal): Promise<unknown> {
        const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
            model: this.opts.model,
            messages: toMessages(request),
            response_format: zodResponseFormat(AdviceResponseSchema, 'routing_advice')
        };

        const response = await this.client.chat.completions.create(params, { signal });
        const content = response.choices[0]?.message.content;
        if (!content) {
            throw new Error('Routing advisor returned an empty response');
        }

        const parsed: unknown = JSON.parse(content);
        return parsed;
    }
}
