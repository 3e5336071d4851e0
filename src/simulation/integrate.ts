import { orbMass } from '../orb-classes.ts';
import { orbAt, pickupAt } from '../pools.ts';
import type { Session } from '../session.ts';
import { isFrozen } from './power-up.ts';

/**
 * 半陰的オイラー法（速度 → 位置の順）。a = F / m、オーブには線形減衰をかける。
 * Freeze 中は位置も速度も動かさず、蓄積された力だけ捨てる
 */
export function integrate(s: Session, dt: number) {
  const pool = s.orbs;
  const frozen = isFrozen(s);
  const damp = 1 / (1 + s.config.orbLinearDamping * dt);
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (!frozen && !o.processed) {
      const m = orbMass(o.diameter, o.cls);
      o.vx = (o.vx + (o.fx / m) * dt) * damp;
      o.vy = (o.vy + (o.fy / m) * dt) * damp;
      o.x += o.vx * dt;
      o.y += o.vy * dt;
    }
    o.fx = 0;
    o.fy = 0;
  }
  if (frozen) return;
  const pickups = s.pickups;
  for (let i = 0, rem = pickups.count; i < pickups.slots.length && rem > 0; i++) {
    const p = pickupAt(pickups, i);
    if (!p.alive) continue;
    rem--;
    if (p.processed) continue;
    p.x += p.vx * dt;
    p.y += p.vy * dt;
  }
}
