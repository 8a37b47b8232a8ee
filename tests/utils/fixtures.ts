import type { PullRequest, ReviewerEntry } from '../../src/domain/models';

export function reviewer(overrides: Partial<ReviewerEntry> = {}): ReviewerEntry {
  return {
    identity: 'alice@example.com',
    vote: 10,
    reviewedAt: '2024-03-10T09:30:00Z',
    ...overrides,
  };
}

export function pullRequest(overrides: Partial<PullRequest> = {}): PullRequest {
  return {
    id: 1,
    title: 'Add login form',
    createdAt: '2024-03-01T08:00:00Z',
    author: 'Carol Author',
    reviewers: [],
    ...overrides,
  };
}
