import { COLLECTOR_MASS_MULTIPLIER } from '../constants.ts';
import { orbMass } from '../orb-classes.ts';
import { orbAt } from '../pools.ts';
import type { Session } from '../session.ts';
import { bodyMass } from '../vec.ts';
import { isFrozen } from './power-up.ts';

// 力は fx/fy に蓄積するだけで、速度への反映は積分ステップ（integrate.ts またはホスト側）が行う。

/** コレクター → オーブ。オーブ側だけが力を受ける。軌道偏向中のオーブは対象外 */
export function applyCollectorGravity(s: Session) {
  const c = s.collector;
  const cfg = s.config;
  const pool = s.orbs;
  const G = cfg.gravitationalConstant;
  const cMass = bodyMass(c.diameter, COLLECTOR_MASS_MULTIPLIER);
  const rangeSq = cfg.gravityMaxDistance * cfg.gravityMaxDistance;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (o.processed || o.orbital) continue;
    const dx = c.x - o.x,
      dy = c.y - o.y;
    const d2 = dx * dx + dy * dy;
    if (d2 >= rangeSq || d2 === 0) continue;
    const d = Math.sqrt(d2);
    const f = (G * cMass * orbMass(o.diameter, o.cls)) / d2;
    o.fx += (dx / d) * f;
    o.fy += (dy / d) * f;
  }
}

/**
 * オーブ同士。O(n²) だが大半のペアは範囲外なので平方根の前に二乗距離で棄却する。
 * 作用反作用は適用せず、軽い方だけが重い方へ引かれる（大きいオーブを安定させるため）
 */
export function applyOrbGravity(s: Session) {
  const cfg = s.config;
  const pool = s.orbs;
  if (pool.count < 2) return;
  const G = cfg.gravitationalConstant * cfg.orbGravityMultiplier;
  const rangeSq = cfg.orbGravityRange * cfg.orbGravityRange;
  const cap = pool.slots.length;
  for (let i = 0; i < cap; i++) {
    const a = orbAt(pool, i);
    if (!a.alive || a.processed) continue;
    const ax = a.x,
      ay = a.y;
    for (let j = i + 1; j < cap; j++) {
      const b = orbAt(pool, j);
      if (!b.alive || b.processed) continue;
      const dx = b.x - ax,
        dy = b.y - ay;
      const d2 = dx * dx + dy * dy;
      if (d2 >= rangeSq || d2 === 0) continue;
      const d = Math.sqrt(d2);
      const ma = orbMass(a.diameter, a.cls);
      const mb = orbMass(b.diameter, b.cls);
      const f = (G * ma * mb) / d2;
      const ux = dx / d,
        uy = dy / d;
      if (ma > mb) {
        b.fx -= ux * f;
        b.fy -= uy * f;
      } else {
        a.fx += ux * f;
        a.fy += uy * f;
      }
    }
  }
}

export function applyGravity(s: Session) {
  if (s.terminal !== null || isFrozen(s)) return;
  applyCollectorGravity(s);
  applyOrbGravity(s);
}
