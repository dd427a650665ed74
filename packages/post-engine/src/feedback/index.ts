import { appendFile } from 'fs/promises';
import type { FeedbackEntry, FeedbackRequest } from '../types';

/**
 * Append-only destination for post ratings
 */
export interface FeedbackSink {
  record(request: FeedbackRequest): Promise<FeedbackEntry>;
}

export function toFeedbackEntry(request: FeedbackRequest, now: Date = new Date()): FeedbackEntry {
  return {
    timestamp: request.timestamp || now.toISOString(),
    postIndex: request.postIndex,
    rating: request.rating,
    postPreview: request.postPreview,
    sessionId: 'anonymous',
  };
}

/**
 * Writes one JSON object per line
 */
export class JsonlFeedbackSink implements FeedbackSink {
  constructor(private readonly filePath: string) {}

  async record(request: FeedbackRequest): Promise<FeedbackEntry> {
    const entry = toFeedbackEntry(request);
    await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    console.log(`[Feedback] ${entry.rating} feedback for post ${entry.postIndex}`);
    return entry;
  }
}

export class InMemoryFeedbackSink implements FeedbackSink {
  private entries: FeedbackEntry[] = [];

  async record(request: FeedbackRequest): Promise<FeedbackEntry> {
    const entry = toFeedbackEntry(request);
    this.entries.push(entry);
    return entry;
  }

  getEntries(): FeedbackEntry[] {
    return [...this.entries];
  }
}
