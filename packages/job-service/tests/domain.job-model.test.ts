import { describe, expect, it } from 'vitest';

import {
  type ProgressEvent,
  canTransition,
  deriveStatus,
  isTerminal,
} from '../src/domain/job-model.js';

describe('domain/job-model - job state transitions', () => {
  /**
   * Intent:
   * - Protect the lifecycle table: forward one step at a time, same-stage
   *   updates always allowed, error reachable from any non-terminal state.
   * - Terminal states accept nothing.
   */

  it('allows the success path one step at a time', () => {
    expect(canTransition('initializing', 'downloading')).toBe(true);
    expect(canTransition('downloading', 'importing')).toBe(true);
    expect(canTransition('importing', 'processing')).toBe(true);
    expect(canTransition('processing', 'complete')).toBe(true);
  });

  it('allows progress within a stage', () => {
    expect(canTransition('downloading', 'downloading')).toBe(true);
    expect(canTransition('processing', 'processing')).toBe(true);
  });

  it('allows error from every non-terminal state', () => {
    for (const from of ['initializing', 'downloading', 'importing', 'processing'] as const) {
      expect(canTransition(from, 'error')).toBe(true);
    }
  });

  it('rejects skipped and backward transitions', () => {
    expect(canTransition('initializing', 'processing')).toBe(false);
    expect(canTransition('downloading', 'complete')).toBe(false);
    expect(canTransition('processing', 'downloading')).toBe(false);
  });

  it('rejects transitions out of terminal states', () => {
    expect(canTransition('complete', 'downloading')).toBe(false);
    expect(canTransition('complete', 'complete')).toBe(false);
    expect(canTransition('error', 'error')).toBe(false);
    expect(isTerminal('complete')).toBe(true);
    expect(isTerminal('error')).toBe(true);
    expect(isTerminal('processing')).toBe(false);
  });

  it('derives status from the latest event', () => {
    const at = new Date('2024-05-01T10:00:00Z');
    const events: ProgressEvent[] = [
      { timestamp: at, stage: 'initializing' },
      { timestamp: at, stage: 'downloading', progress: 0.2 },
    ];

    expect(deriveStatus([])).toBe('initializing');
    expect(deriveStatus(events)).toBe('downloading');
  });
});
