import { orbAt, snapshotOrb } from '../pools.ts';
import type { Session } from '../session.ts';
import type { OrbIndex } from '../types.ts';
import { distSq } from '../vec.ts';
import { canConsume } from './growth.ts';

/** 消費できないサイズのオーブが警告距離内にあるか。状態が変わったときだけ通知する */
export function updateDanger(s: Session) {
  const c = s.collector;
  const rangeSq = s.config.dangerDistance * s.config.dangerDistance;
  const pool = s.orbs;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (o.processed) continue;
    const inDanger = !canConsume(c.diameter, o.diameter) && distSq(c.x, c.y, o.x, o.y) < rangeSq;
    if (inDanger === o.danger) continue;
    o.danger = inDanger;
    s.sink.onDangerChanged(snapshotOrb(i as OrbIndex, o), inDanger);
  }
}
