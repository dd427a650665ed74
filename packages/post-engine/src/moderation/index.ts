import type { Post } from '../types';

export const BANNED_TERMS = [
  'spam',
  'scam',
  'hate',
  'violence',
  'discriminat',
  'harass',
  'illegal',
  'fraud',
  'misleading',
  'fake news',
  'misinformation',
] as const;

// Capitalization is only judged on text longer than this
const CAPS_MIN_LENGTH = 50;
const CAPS_MAX_RATIO = 0.7;

const REPEATED_PUNCTUATION = /!{3,}|\?{3,}|\${3,}/;

export const MODERATED_MESSAGE =
  '[This post was moderated for containing potentially inappropriate content. Please try generating again with a different topic.]';

export const MODERATED_POST: Post = {
  postText: MODERATED_MESSAGE,
  hashtags: ['#ContentModerated'],
  cta: 'Please try again with a different topic.',
};

export interface ModerationResult {
  isSafe: boolean;
  sanitizedText: string;
  reason?: string;
}

function findBannedTerm(text: string): string | undefined {
  const lower = text.toLowerCase();
  return BANNED_TERMS.find((term) => lower.includes(term));
}

function isShouting(text: string): boolean {
  if (text.length <= CAPS_MIN_LENGTH) return false;

  const letters = text.match(/\p{L}/gu) ?? [];
  if (letters.length === 0) return false;

  const upper = letters.filter((c) => c !== c.toLowerCase() && c === c.toUpperCase()).length;
  return upper / letters.length > CAPS_MAX_RATIO;
}

/**
 * Classify text with three heuristics: banned terms, shouting and
 * punctuation spam. Unsafe text is replaced with a fixed message.
 */
export function moderate(text: string): ModerationResult {
  const bannedTerm = findBannedTerm(text);
  if (bannedTerm) {
    return {
      isSafe: false,
      sanitizedText: MODERATED_MESSAGE,
      reason: `Contains potentially inappropriate content: '${bannedTerm}'`,
    };
  }

  if (isShouting(text)) {
    return { isSafe: false, sanitizedText: MODERATED_MESSAGE, reason: 'Excessive capitalization detected' };
  }

  if (REPEATED_PUNCTUATION.test(text)) {
    return { isSafe: false, sanitizedText: MODERATED_MESSAGE, reason: 'Excessive punctuation detected' };
  }

  return { isSafe: true, sanitizedText: text };
}

/**
 * The verdict on the post text decides for the whole post
 */
export function moderatePost(post: Post): { post: Post; flagged: boolean; reason?: string } {
  const result = moderate(post.postText);

  if (result.isSafe) {
    return { post, flagged: false };
  }

  return {
    post: { ...MODERATED_POST, hashtags: [...MODERATED_POST.hashtags] },
    flagged: true,
    reason: result.reason,
  };
}
