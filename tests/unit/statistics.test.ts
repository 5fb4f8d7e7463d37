import { describe, it, expect } from 'vitest';
import {
  averagePerDay,
  computeActivityIndex,
  countPeriodDays,
  pickMostActive,
  roundTo,
  summarizeCommits,
  summarizeIssues,
  summarizeLanguages,
  summarizePullRequests,
} from '../../src/services/statistics';

describe('statistics', () => {
  describe('countPeriodDays', () => {
    it('should count both ends of the window', () => {
      expect(countPeriodDays(new Date('2024-03-01T00:00:00Z'), new Date('2024-03-30T23:59:59Z'))).toBe(30);
    });

    it('should count a same-day window as one day', () => {
      expect(countPeriodDays(new Date('2024-03-01T00:00:00Z'), new Date('2024-03-01T10:00:00Z'))).toBe(1);
    });
  });

  describe('averagePerDay', () => {
    it('should round to two decimals', () => {
      expect(averagePerDay(120, 30)).toBe(4);
      expect(averagePerDay(10, 3)).toBe(3.33);
    });

    it('should return zero for an empty period', () => {
      expect(averagePerDay(5, 0)).toBe(0);
    });
  });

  describe('computeActivityIndex', () => {
    it('should express commits per subscriber as a percentage', () => {
      expect(computeActivityIndex(120, 40)).toBe(300);
      expect(computeActivityIndex(1, 3)).toBe(33.33);
    });

    it('should treat a repository without subscribers as having one', () => {
      expect(computeActivityIndex(5, 0)).toBe(500);
    });
  });

  describe('pickMostActive', () => {
    it('should keep the first key on a tie', () => {
      expect(pickMostActive(new Map([['alice', 2], ['bob', 2]]))).toBe('alice');
    });

    it('should return null for no entries', () => {
      expect(pickMostActive(new Map())).toBeNull();
    });
  });

  it('should round to the requested precision', () => {
    expect(roundTo(3.14159)).toBe(3.14);
    expect(roundTo(2.345, 1)).toBe(2.3);
  });

  describe('summarizeCommits', () => {
    it('should aggregate by author and by day', () => {
      const stats = summarizeCommits(
        [
          { author: 'alice', date: '2024-01-02T10:00:00Z' },
          { author: 'bob', date: '2024-01-02T11:00:00Z' },
          { author: 'bob', date: '2024-01-03T09:00:00Z' },
          { author: 'alice', date: null },
        ],
        2
      );

      expect(stats).toEqual({
        total_commits: 4,
        commits_by_author: { alice: 2, bob: 2 },
        commits_by_day: { '2024-01-02': 2, '2024-01-03': 1 },
        average_commits_per_day: 2,
        most_active_day: '2024-01-02',
        most_active_author: 'alice',
      });
    });

    it('should report nulls without commits', () => {
      const stats = summarizeCommits([], 30);

      expect(stats.total_commits).toBe(0);
      expect(stats.most_active_day).toBeNull();
      expect(stats.most_active_author).toBeNull();
      expect(stats.average_commits_per_day).toBe(0);
    });
  });

  describe('summarizeIssues', () => {
    it('should skip pull requests and count labels', () => {
      const stats = summarizeIssues([
        { state: 'open', labels: ['bug'], isPullRequest: false },
        { state: 'closed', labels: ['bug', 'docs'], isPullRequest: false },
        { state: 'open', labels: ['bug'], isPullRequest: true },
      ]);

      expect(stats).toEqual({
        total_issues: 2,
        open_issues: 1,
        closed_issues: 1,
        issues_by_label: { bug: 2, docs: 1 },
      });
    });
  });

  describe('summarizePullRequests', () => {
    it('should count merged pull requests among the closed ones', () => {
      const stats = summarizePullRequests([
        { state: 'open', mergedAt: null },
        { state: 'closed', mergedAt: '2024-01-05T00:00:00Z' },
        { state: 'closed', mergedAt: null },
      ]);

      expect(stats).toEqual({ total_prs: 3, open_prs: 1, closed_prs: 2, merged_prs: 1 });
    });
  });

  describe('summarizeLanguages', () => {
    it('should pick the largest language as primary', () => {
      expect(summarizeLanguages({ CSS: 100, TypeScript: 300 })).toEqual({
        languages: { CSS: 100, TypeScript: 300 },
        primary_language: 'TypeScript',
        total_bytes: 400,
      });
    });

    it('should handle a repository without code', () => {
      expect(summarizeLanguages({})).toEqual({ languages: {}, primary_language: null, total_bytes: 0 });
    });
  });
});
