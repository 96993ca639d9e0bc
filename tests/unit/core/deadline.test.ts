import { describe, it, expect } from 'vitest';
import { Deadline } from '../../../src/core/deadline.js';
import { DeadlineError } from '../../../src/utils/errors.js';

function fakeClock(start = 1000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return { now: () => current, advance: (ms) => { current += ms; } };
}

describe('Deadline', () => {
  it('should never expire without a budget', () => {
    const clock = fakeClock();
    const deadline = new Deadline(undefined, clock.now);
    clock.advance(1_000_000);

    expect(deadline.expired()).toBe(false);
    expect(() => deadline.check('ingestion')).not.toThrow();
  });

  it('should measure elapsed time from construction', () => {
    const clock = fakeClock();
    const deadline = new Deadline(100, clock.now);
    clock.advance(40);

    expect(deadline.elapsedMs()).toBe(40);
    expect(deadline.expired()).toBe(false);
  });

  it('should expire once the budget is spent', () => {
    const clock = fakeClock();
    const deadline = new Deadline(100, clock.now);
    clock.advance(100);

    expect(deadline.expired()).toBe(true);
  });

  it('should report the time left, never below zero', () => {
    const clock = fakeClock();
    const deadline = new Deadline(100, clock.now);
    clock.advance(30);

    expect(deadline.remainingMs()).toBe(70);
    clock.advance(500);
    expect(deadline.remainingMs()).toBe(0);
    expect(new Deadline(undefined, clock.now).remainingMs()).toBeUndefined();
  });

  it('should expire immediately with a zero budget', () => {
    expect(new Deadline(0, fakeClock().now).expired()).toBe(true);
  });

  it('should throw a DeadlineError naming the phase', () => {
    const clock = fakeClock();
    const deadline = new Deadline(10, clock.now);
    clock.advance(25);

    expect(() => deadline.check('evaluation')).toThrow(DeadlineError);
    try {
      deadline.check('evaluation');
    } catch (error) {
      expect(error).toMatchObject({ phase: 'evaluation', details: { elapsedMs: 25 } });
    }
  });
});
