import type { CompletionOperation } from '../types';
import { toHashtag } from '../parsers';
import type { CompletionRequest, CompletionStrategy, StrategyResponse } from './strategy';

const MOCK_ANGLES = [
  (topic: string) => `Personal career lessons learned from ${topic}`,
  (topic: string) => `Industry trends and future predictions for ${topic}`,
  (topic: string) => `Practical tips and best practices for ${topic}`,
  (topic: string) => `Common misconceptions about ${topic}`,
  (topic: string) => `How teams can get started with ${topic}`,
];

const firstQuoted = (prompt: string): string | undefined => prompt.match(/"([^"]+)"/)?.[1];

/**
 * Canned, deterministic text for a prompt. Echoes the topic or angle quoted
 * in the prompt so runs without credentials still look like real output.
 */
export function mockResponse(prompt: string, operation: CompletionOperation): string {
  switch (operation) {
    case 'brainstorm': {
      const topic = firstQuoted(prompt) ?? 'your topic';
      const requested = Number(prompt.match(/brainstorm (\d+)/i)?.[1] ?? '3');
      const count = Math.min(Math.max(requested, 1), MOCK_ANGLES.length);
      return MOCK_ANGLES.slice(0, count)
        .map((angle, i) => `${i + 1}. ${angle(topic)}`)
        .join('\n');
    }

    case 'draft': {
      const angle = prompt.match(/angle: "([^"]+)"/)?.[1] ?? 'Growing as a professional';
      return `🚀 ${angle}

I've been reflecting on this lately, and one idea keeps coming back: progress comes from small, consistent steps rather than big leaps.

Whether you're just starting out or you've been at it for years, it pays to stay curious, ask better questions, and share what you learn with the people around you.

What's one lesson you've picked up along the way? I'd love to hear your perspective in the comments.`;
    }

    case 'refine': {
      const topic = firstQuoted(prompt) ?? 'Professional';
      return JSON.stringify(
        {
          hashtags: [toHashtag(topic), '#CareerGrowth', '#ContinuousLearning', '#ProfessionalDevelopment', '#Innovation'],
          cta: "What's one thing you've learned recently that changed your perspective? Share your thoughts in the comments.",
        },
        null,
        2
      );
    }

    default:
      return 'Mock response - completion provider not configured';
  }
}

/**
 * Used when no API key is configured. Zero cost, no network.
 */
export class MockCompletionStrategy implements CompletionStrategy {
  readonly provider = 'mock';
  readonly model = 'mock';
  readonly mode = 'mock' as const;

  async complete(request: CompletionRequest): Promise<StrategyResponse> {
    return {
      text: mockResponse(request.prompt, request.operation),
      costFree: true,
    };
  }
}
