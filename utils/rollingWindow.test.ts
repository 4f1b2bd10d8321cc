import { describe, it, expect } from 'vitest';
import { RollingWindow } from './rollingWindow';

describe('RollingWindow', () => {
  it('evicts the oldest value once full', () => {
    const window = new RollingWindow(3);
    [1, 2, 3, 10].forEach((v) => window.push(v));

    // holds 2, 3, 10
    expect(window.size).toBe(3);
    expect(window.average()).toBe(5);
  });

  it('keeps evicting in order as it wraps around', () => {
    const window = new RollingWindow(2);
    [1, 2, 3, 4, 5].forEach((v) => window.push(v));

    expect(window.average()).toBe(4.5);
  });

  it('averages a partially filled window over what it holds', () => {
    const window = new RollingWindow(5);
    window.push(2);
    window.push(4);

    expect(window.size).toBe(2);
    expect(window.average()).toBe(3);
  });

  it('has no average when empty', () => {
    expect(new RollingWindow(2).average()).toBeNull();
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new RollingWindow(0)).toThrow(RangeError);
    expect(() => new RollingWindow(2.5)).toThrow(RangeError);
  });
});
