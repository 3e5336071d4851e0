import { describe, expect, it } from 'vitest';
import { createConfig, DEFAULT_CONFIG } from './config.ts';

describe('createConfig', () => {
  it('上書きなしなら既定値と同じ値を凍結して返す', () => {
    const cfg = createConfig();
    expect(cfg).toEqual(DEFAULT_CONFIG);
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it('調整済みの定数は丸めずに保持する', () => {
    expect(DEFAULT_CONFIG.growthBase).toBe(0.01467428);
    expect(DEFAULT_CONFIG.growthRelativeCoeff).toBe(0.05135996);
  });

  it('上書きした値だけ差し替わる', () => {
    const cfg = createConfig({ mergeCooldown: 0, passiveShrinkRate: 0 });
    expect(cfg.mergeCooldown).toBe(0);
    expect(cfg.passiveShrinkRate).toBe(0);
    expect(cfg.maxMergedOrbs).toBe(10);
  });

  it('範囲外の値は RangeError', () => {
    expect(() => createConfig({ gravitationalConstant: Number.NaN })).toThrow(RangeError);
    expect(() => createConfig({ mergeCooldown: -1 })).toThrow(RangeError);
    expect(() => createConfig({ orbitalDuration: 0 })).toThrow(RangeError);
    expect(() => createConfig({ shrinkMultiplier: 1.2 })).toThrow(RangeError);
    expect(() => createConfig({ maxMergedOrbs: 2.5 })).toThrow(RangeError);
    expect(() => createConfig({ wrongClassPenalty: 10 })).toThrow(RangeError);
  });

  it('項目間の整合性もチェックする', () => {
    expect(() => createConfig({ minDiameter: 40 })).toThrow(RangeError);
    expect(() => createConfig({ orbGravityRange: 600 })).toThrow(RangeError);
  });
});
