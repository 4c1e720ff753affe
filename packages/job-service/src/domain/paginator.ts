// packages/job-service/src/domain/paginator.ts
import { InvalidRequestError } from '@setsplit/contracts';

import type { JobRecord } from './job-model.js';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface PageRequest {
  page: number;
  pageSize: number;
  maxPageSize?: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  pageSize: number;
  totalJobs: number;
  totalPages: number;
}

type Orderable = Pick<JobRecord, 'id' | 'sequence'>;

/** Creation order, ties broken by identifier. */
export function compareByCreation(a: Orderable, b: Orderable): number {
  if (a.sequence !== b.sequence) return a.sequence - b.sequence;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

// paginate.declaration()
export function paginate<T extends Orderable>(jobs: readonly T[], request: PageRequest): Page<T> {
  const { page } = request;
  const maxPageSize = request.maxPageSize ?? MAX_PAGE_SIZE;

  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidRequestError(`page must be a positive integer, got ${page}`);
  }
  if (!Number.isInteger(request.pageSize) || request.pageSize < 1) {
    throw new InvalidRequestError(`pageSize must be a positive integer, got ${request.pageSize}`);
  }

  const pageSize = Math.min(request.pageSize, maxPageSize);
  const totalJobs = jobs.length;
  const totalPages = Math.ceil(totalJobs / pageSize);
  const start = (page - 1) * pageSize;

  const items = start >= totalJobs ? [] : [...jobs].sort(compareByCreation).slice(start, start + pageSize);

  return { items, page, pageSize, totalJobs, totalPages };
}
