import { describe, expect, it } from 'vitest';

import { InvalidRequestError } from '@setsplit/contracts';

import { compareByCreation, paginate } from '../src/domain/paginator.js';

const jobs = [
  { id: 'e', sequence: 5 },
  { id: 'a', sequence: 1 },
  { id: 'c', sequence: 3 },
  { id: 'b', sequence: 2 },
  { id: 'd', sequence: 4 },
];

describe('domain/paginator', () => {
  it('returns the first page in creation order with totals', () => {
    const page = paginate(jobs, { page: 1, pageSize: 2 });

    expect(page.items.map((job) => job.id)).toEqual(['a', 'b']);
    expect(page.totalJobs).toBe(5);
    expect(page.totalPages).toBe(3);
  });

  it('returns a short last page', () => {
    expect(paginate(jobs, { page: 3, pageSize: 2 }).items.map((job) => job.id)).toEqual(['e']);
  });

  it('returns an empty page past the end with accurate totals', () => {
    const page = paginate(jobs, { page: 4, pageSize: 2 });

    expect(page.items).toEqual([]);
    expect(page.totalJobs).toBe(5);
    expect(page.totalPages).toBe(3);
  });

  it('clamps pageSize to the maximum', () => {
    const page = paginate(jobs, { page: 1, pageSize: 50, maxPageSize: 3 });

    expect(page.pageSize).toBe(3);
    expect(page.items).toHaveLength(3);
    expect(page.totalPages).toBe(2);
  });

  it('breaks sequence ties by identifier', () => {
    const tied = [
      { id: 'z', sequence: 1 },
      { id: 'm', sequence: 1 },
    ];

    expect([...tied].sort(compareByCreation).map((job) => job.id)).toEqual(['m', 'z']);
  });

  it('rejects page or pageSize below one', () => {
    expect(() => paginate(jobs, { page: 0, pageSize: 2 })).toThrow(InvalidRequestError);
    expect(() => paginate(jobs, { page: 1, pageSize: 0 })).toThrow(
      'pageSize must be a positive integer, got 0',
    );
    expect(() => paginate(jobs, { page: 1.5, pageSize: 2 })).toThrow(InvalidRequestError);
  });

  it('handles an empty registry', () => {
    expect(paginate([], { page: 1, pageSize: 10 })).toEqual({
      items: [],
      page: 1,
      pageSize: 10,
      totalJobs: 0,
      totalPages: 0,
    });
  });
});
