import type { Decision } from './models';

/**
 * Decision kinds in report column order
 */
export const DECISIONS: readonly Decision[] = ['Approved', 'Rejected'];

// 10 approved, 5 approved with suggestions, -10 rejected.
// 0 (no vote) and -5 (waiting for author) carry no decision.
const VOTE_DECISIONS = new Map<number, Decision>([
  [10, 'Approved'],
  [5, 'Approved'],
  [-10, 'Rejected'],
]);

export function classifyVote(vote: number): Decision | null {
  return VOTE_DECISIONS.get(vote) ?? null;
}

export function emptyCounts(): Record<Decision, number> {
  return { Approved: 0, Rejected: 0 };
}
