import { describe, it, expect } from 'vitest';
import { TerminationTracker } from './termination-tracker.js';

describe('TerminationTracker', () => {
  it('reports the removal that empties the set, in either order', () => {
    const forward = new TerminationTracker(['terminated', 'exited']);
    expect(forward.remove('terminated')).toBe(false);
    expect(forward.remove('exited')).toBe(true);

    const reverse = new TerminationTracker(['terminated', 'exited']);
    expect(reverse.remove('exited')).toBe(false);
    expect(reverse.remove('terminated')).toBe(true);
    expect(reverse.isEmpty).toBe(true);
  });

  it('ignores unexpected and repeated event types', () => {
    const tracker = new TerminationTracker(['terminated', 'exited']);

    expect(tracker.remove('output')).toBe(false);
    expect(tracker.remove('exited')).toBe(false);
    expect(tracker.remove('exited')).toBe(false);
    expect(tracker.remaining).toEqual(['terminated']);
  });

  it('never reports emptiness twice', () => {
    const tracker = new TerminationTracker(['terminated']);

    expect(tracker.remove('terminated')).toBe(true);
    expect(tracker.remove('terminated')).toBe(false);
  });
});
