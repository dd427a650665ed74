import type { SearchContext } from '../types';

interface DraftPromptOptions {
  angle: string;
  tone?: string;
  audience?: string;
  context?: SearchContext;
}

/**
 * Search query used for the research step
 */
export function buildSearchQuery(topic: string, now: Date = new Date()): string {
  return `${topic} latest news trends ${now.getFullYear()}`;
}

/**
 * Brainstorm prompt: asks for exactly `count` angles as a numbered list
 */
export function buildBrainstormPrompt(
  topic: string,
  count: number,
  context?: SearchContext
): string {
  if (context?.found) {
    return `Using the following recent context about "${topic}", brainstorm ${count} unique angles for a LinkedIn post.

Context:
${context.text}

Return only a numbered list of these angles, one per line.`;
  }

  return `Based on the topic "${topic}", brainstorm ${count} unique angles for a LinkedIn post. Return only a numbered list of these angles, one per line.`;
}

/**
 * Draft prompt for a single angle
 */
export function buildDraftPrompt(options: DraftPromptOptions): string {
  const { angle, tone, audience, context } = options;

  const contextText = context?.found
    ? `Use this context for factual accuracy:\n${context.text}\n\n`
    : '';
  const audienceText = audience ? `The target audience is ${audience}. ` : '';
  const toneText = tone ? `The tone should be ${tone}. ` : '';

  return `${contextText}Write a LinkedIn post from the angle: "${angle}". ${audienceText}${toneText}The post should be engaging and around 150 words. Include emojis where appropriate. Do not include hashtags.`;
}

/**
 * Refinement prompt: hashtags and a call-to-action as JSON
 */
export function buildRefinePrompt(topic: string, postText: string): string {
  return `For the following LinkedIn post about "${topic}", generate 5 relevant hashtags and a compelling one-sentence call-to-action (CTA).
Format the output as JSON with "hashtags" (array of strings) and "cta" (string) keys.

Post:
${postText}

Return only the JSON object.`;
}

/**
 * Templated post used when drafting an angle fails
 */
export function buildFallbackDraft(topic: string, angle: string): string {
  return `💡 ${angle}

Here's a thought I keep coming back to about ${topic}: the people who grow fastest are the ones who stay curious, test small ideas, and share what they learn along the way.

How is ${topic} showing up in your work right now?`;
}
