import { describe, it, expect } from 'vitest';
import { ActionCompletionCorrelator } from '../../src/application/completion-correlator.js';
import { decodeRobotStatus, encodeRobotStatus } from '../../src/domain/robot-status.js';
import { captureLogger } from '../helpers/logger.js';

function setup() {
  let now = 0;
  const correlator = new ActionCompletionCorrelator({
    log: captureLogger().log,
    quietIntervalMs: 250,
    nowFn: () => now,
  });
  return {
    correlator,
    at: (ms: number) => {
      now = ms;
    },
  };
}

describe('ActionCompletionCorrelator', () => {
  it('ignores inactive reports inside the quiet interval', async () => {
    const { correlator, at } = setup();
    const handle = correlator.begin('animation');

    at(10);
    expect(correlator.update('animation', false)).toBe(false);
    at(50);
    expect(correlator.update('animation', false)).toBe(false);
    at(260);
    expect(correlator.update('animation', true)).toBe(false);
    expect(handle.isSettled).toBe(false);

    expect(correlator.update('animation', false)).toBe(true);
    await expect(handle.completion).resolves.toBe('completed');
    expect(correlator.pending('animation')).toBeUndefined();
  });

  it('completes exactly at the end of the quiet interval', () => {
    const { correlator, at } = setup();
    const handle = correlator.begin('pathing');

    at(250);
    expect(correlator.update('pathing', false)).toBe(true);
    expect(handle.outcome).toBe('completed');
  });

  it('supersedes the pending handle when the same kind begins again', async () => {
    const { correlator } = setup();
    const first = correlator.begin('animation');
    const second = correlator.begin('animation');

    await expect(first.completion).resolves.toBe('superseded');
    expect(correlator.pending('animation')).toBe(second);
    expect(second.isSettled).toBe(false);
  });

  it('tracks kinds independently from one status snapshot', () => {
    const { correlator, at } = setup();
    const animation = correlator.begin('animation');
    const docking = correlator.begin('docking');

    at(300);
    correlator.updateFromStatus(decodeRobotStatus(encodeRobotStatus(['isDockingToMarker'])));

    expect(animation.outcome).toBe('completed');
    expect(docking.isSettled).toBe(false);
  });

  it('cancels a single handle or every pending handle', async () => {
    const { correlator } = setup();
    const motors = correlator.begin('motors');
    const pathing = correlator.begin('pathing');
    const animation = correlator.begin('animation');

    expect(correlator.cancel(motors)).toBe(true);
    expect(correlator.cancel(motors)).toBe(false);
    expect(correlator.cancelAll()).toBe(2);

    await expect(pathing.completion).resolves.toBe('cancelled');
    expect(animation.outcome).toBe('cancelled');
    expect(correlator.pending('pathing')).toBeUndefined();
  });

  it('does not let a superseded handle be completed later', () => {
    const { correlator, at } = setup();
    const first = correlator.begin('animation');
    correlator.begin('animation');

    at(500);
    correlator.update('animation', false);

    expect(first.outcome).toBe('superseded');
  });
});
