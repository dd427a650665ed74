import { z } from 'zod';

export const MIN_HASHTAGS = 3;
export const MAX_HASHTAGS = 5;

export const DEFAULT_CTA = 'What are your thoughts? Share in the comments!';

// Used to pad a short brainstorm, in this order
const FALLBACK_ANGLES = [
  (topic: string) => `Personal experience with ${topic}`,
  (topic: string) => `Industry trends related to ${topic}`,
  (topic: string) => `Best practices for ${topic}`,
  (topic: string) => `Future of ${topic}`,
  (topic: string) => `Common mistakes in ${topic}`,
  (topic: string) => `Lessons learned from ${topic}`,
  (topic: string) => `Myths and misconceptions about ${topic}`,
  (topic: string) => `Getting started with ${topic}`,
  (topic: string) => `Tools and resources for ${topic}`,
  (topic: string) => `The human side of ${topic}`,
];

const STOP_WORDS = new Set([
  'about', 'after', 'their', 'there', 'these', 'those', 'through', 'which', 'while', 'where',
  'would', 'could', 'should', 'being', 'other', 'related', 'common', 'future',
]);

// "1.", "2)", "3:", "4]", "-", "*", "•"
const LIST_ITEM = /^(?:\d{1,2}\s*[.):\]]|[-*•])\s*(.*)$/;

const RefinementSchema = z.object({
  hashtags: z.union([z.array(z.string()), z.string()]).optional(),
  cta: z.string().optional(),
});

export interface Refinement {
  hashtags: string[];
  cta: string;
}

function cleanAngle(text: string): string {
  return text
    .replace(/\*\*|__/g, '')
    .replace(/^["'“”‘’]+|["'“”‘’]+$/g, '')
    .trim();
}

/**
 * Extract angles from free-form brainstorm output.
 *
 * Accepts numbered, bulleted or plain newline-delimited lists. The result
 * always has exactly `count` entries: extras are dropped and a short list is
 * padded with angles derived from the topic.
 */
export function parseAngles(raw: string, count: number, topic: string): string[] {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.replace(/^\s*\*\*/, '').trim())
    .filter(Boolean);

  const listItems = lines
    .map((line) => line.match(LIST_ITEM)?.[1])
    .filter((item): item is string => item !== undefined);

  // No list markers: treat every line as an angle, minus "Here are..." preambles
  const candidates =
    listItems.length > 0 ? listItems : lines.filter((line) => !line.endsWith(':'));

  const angles: string[] = [];
  const seen = new Set<string>();

  const add = (angle: string): void => {
    const key = angle.toLowerCase();
    if (angle && !seen.has(key) && angles.length < count) {
      seen.add(key);
      angles.push(angle);
    }
  };

  candidates.map(cleanAngle).forEach(add);

  for (const template of FALLBACK_ANGLES) {
    add(template(topic));
  }

  for (let n = angles.length + 1; angles.length < count; n++) {
    add(`${topic}: perspective ${n}`);
  }

  return angles;
}

/**
 * "remote work productivity" -> "#RemoteWorkProductivity"
 */
export function toHashtag(text: string): string {
  const words = text.split(/[^\p{L}\p{N}]+/u).filter(Boolean);
  if (words.length === 0) return '#LinkedIn';
  return `#${words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join('')}`;
}

export function defaultHashtags(topic: string): string[] {
  return [toHashtag(topic), '#LinkedIn', '#Professional', '#Growth', '#Insights'];
}

/**
 * Prefix with '#', strip whitespace and punctuation, drop duplicates
 * (case-insensitive), cap at 5 and pad from `fallback` to at least 3.
 */
export function normalizeHashtags(tags: string[], fallback: string[]): string[] {
  const result: string[] = [];
  const seen = new Set<string>();

  const add = (tag: string): void => {
    const body = tag.replace(/^#+/, '').replace(/[^\p{L}\p{N}_]/gu, '');
    if (!body || result.length >= MAX_HASHTAGS) return;

    const key = body.toLowerCase();
    if (seen.has(key)) return;

    seen.add(key);
    result.push(`#${body}`);
  };

  tags.forEach(add);

  for (const tag of fallback) {
    if (result.length >= MIN_HASHTAGS) break;
    add(tag);
  }

  return result;
}

/**
 * Parse `{ "hashtags": [...], "cta": "..." }` out of a completion.
 * Returns null when no usable JSON object is present.
 */
export function parseRefinement(raw: string, topic: string): Refinement | null {
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  if (!jsonMatch) return null;

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch {
    return null;
  }

  const parsed = RefinementSchema.safeParse(json);
  if (!parsed.success) return null;

  const rawTags = parsed.data.hashtags ?? [];
  const tags = typeof rawTags === 'string' ? rawTags.split(/[\s,]+/) : rawTags;
  const cta = parsed.data.cta?.trim();

  return {
    hashtags: normalizeHashtags(tags, defaultHashtags(topic)),
    cta: cta || DEFAULT_CTA,
  };
}

/**
 * Deterministic hashtags and CTA from the topic and angle, no completion call
 */
export function templateRefinement(topic: string, angle: string): Refinement {
  const keywords = angle
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length >= 5 && !STOP_WORDS.has(word.toLowerCase()))
    .filter((word) => !topic.toLowerCase().includes(word.toLowerCase()))
    .slice(0, 2)
    .map(toHashtag);

  return {
    hashtags: normalizeHashtags([toHashtag(topic), ...keywords, '#LinkedIn', '#Growth'], defaultHashtags(topic)),
    cta: `How does ${topic} show up in your work? Share your experience in the comments.`,
  };
}
