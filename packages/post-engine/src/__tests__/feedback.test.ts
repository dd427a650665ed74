import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { InMemoryFeedbackSink, JsonlFeedbackSink, toFeedbackEntry } from '../feedback';

describe('toFeedbackEntry', () => {
  it('should keep a supplied timestamp', () => {
    expect(
      toFeedbackEntry({ postIndex: 1, rating: 'positive', postPreview: 'Great post', timestamp: '2026-01-02T03:04:05.000Z' })
    ).toEqual({
      postIndex: 1,
      rating: 'positive',
      postPreview: 'Great post',
      timestamp: '2026-01-02T03:04:05.000Z',
      sessionId: 'anonymous',
    });
  });

  it('should default the timestamp to now', () => {
    const now = new Date('2026-03-04T05:06:07.000Z');

    expect(toFeedbackEntry({ postIndex: 0, rating: 'negative', postPreview: 'Meh' }, now).timestamp).toBe(
      '2026-03-04T05:06:07.000Z'
    );
  });
});

describe('InMemoryFeedbackSink', () => {
  it('should keep entries in order', async () => {
    const sink = new InMemoryFeedbackSink();
    await sink.record({ postIndex: 0, rating: 'positive', postPreview: 'First' });
    await sink.record({ postIndex: 1, rating: 'negative', postPreview: 'Second' });

    expect(sink.getEntries().map((entry) => entry.postPreview)).toEqual(['First', 'Second']);
  });
});

describe('JsonlFeedbackSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'post-feedback-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should append one JSON object per line', async () => {
    const file = path.join(dir, 'feedback.jsonl');
    const sink = new JsonlFeedbackSink(file);

    await sink.record({ postIndex: 0, rating: 'positive', postPreview: 'First', timestamp: '2026-01-01T00:00:00.000Z' });
    await sink.record({ postIndex: 2, rating: 'negative', postPreview: 'Third', timestamp: '2026-01-01T00:01:00.000Z' });

    const lines = (await readFile(file, 'utf-8')).trim().split('\n');

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        postIndex: 0,
        rating: 'positive',
        postPreview: 'First',
        sessionId: 'anonymous',
      },
      {
        timestamp: '2026-01-01T00:01:00.000Z',
        postIndex: 2,
        rating: 'negative',
        postPreview: 'Third',
        sessionId: 'anonymous',
      },
    ]);
  });
});
