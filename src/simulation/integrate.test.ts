import { describe, expect, it } from 'vitest';
import { makeSession, spawnAt, spawnPickupAt } from '../__test__/session-helper.ts';
import { orbAt, pickupAt } from '../pools.ts';
import { integrate } from './integrate.ts';

describe('integrate', () => {
  it('速度を減衰させてから位置を進める', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 0, 0, 20, 1, 10, 0);
    integrate(s, 0.1);
    const damp = 1 / (1 + 0.3 * 0.1);
    const o = orbAt(s.orbs, i);
    expect(o.vx).toBeCloseTo(10 * damp, 10);
    expect(o.x).toBeCloseTo(10 * damp * 0.1, 10);
  });

  it('蓄積した力を質量で割って加速し、力をリセットする', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 0, 0, 20, 1);
    const o = orbAt(s.orbs, i);
    o.fx = 100;
    integrate(s, 0.1);
    // 質量 100 → 加速度 1
    expect(o.vx).toBeCloseTo(0.1 / (1 + 0.03), 10);
    expect(o.fx).toBe(0);
  });

  it('Freeze 中はオーブもピックアップも動かず、速度は保持される', () => {
    const { s } = makeSession();
    const i = spawnAt(s, 0, 0, 20, 1, 10, 5);
    const p = spawnPickupAt(s, 'rainbow', 50, 0);
    pickupAt(s.pickups, p).vx = 5;
    s.powerUp.kind = 'freeze';
    s.powerUp.expiresAt = 6;
    orbAt(s.orbs, i).fx = 100;
    integrate(s, 0.1);
    const o = orbAt(s.orbs, i);
    expect(o.x).toBe(0);
    expect(o.vx).toBe(10);
    expect(o.vy).toBe(5);
    expect(o.fx).toBe(0);
    expect(pickupAt(s.pickups, p).x).toBe(50);
  });

  it('ピックアップは等速で流れる', () => {
    const { s } = makeSession();
    const p = spawnPickupAt(s, 'rainbow', 0, 0);
    pickupAt(s.pickups, p).vx = 5;
    integrate(s, 0.1);
    expect(pickupAt(s.pickups, p).x).toBeCloseTo(0.5, 10);
  });
});
