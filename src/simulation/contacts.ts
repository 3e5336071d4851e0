import { orbAt, pickupAt } from '../pools.ts';
import type { Session } from '../session.ts';
import type { OrbIndex, PickupIndex } from '../types.ts';
import { distSq } from '../vec.ts';
import type { Contact } from './collision.ts';

function overlaps(ax: number, ay: number, ad: number, bx: number, by: number, bd: number): boolean {
  const r = (ad + bd) / 2;
  return distSq(ax, ay, bx, by) < r * r;
}

/**
 * 円同士の重なりから接触を列挙して out に詰める（out は呼び出し側で使い回す）。
 * 順序: コレクター↔オーブ → コレクター↔ピックアップ → オーブ↔オーブ。
 * processed なオーブと軌道パートナー同士は除外する
 */
export function detectContacts(s: Session, out: Contact[]): number {
  out.length = 0;
  const c = s.collector;
  const pool = s.orbs;
  const cap = pool.slots.length;
  for (let i = 0; i < cap; i++) {
    const o = orbAt(pool, i);
    if (!o.alive || o.processed) continue;
    if (overlaps(c.x, c.y, c.diameter, o.x, o.y, o.diameter)) out.push({ kind: 'collector-orb', orb: i as OrbIndex });
  }
  const pickups = s.pickups;
  for (let i = 0; i < pickups.slots.length; i++) {
    const p = pickupAt(pickups, i);
    if (!p.alive || p.processed) continue;
    if (overlaps(c.x, c.y, c.diameter, p.x, p.y, p.diameter)) {
      out.push({ kind: 'collector-pickup', pickup: i as PickupIndex });
    }
  }
  for (let i = 0; i < cap; i++) {
    const a = orbAt(pool, i);
    if (!a.alive || a.processed) continue;
    for (let j = i + 1; j < cap; j++) {
      const b = orbAt(pool, j);
      if (!b.alive || b.processed) continue;
      if ((a.orbital && a.orbitPartner === j) || (b.orbital && b.orbitPartner === i)) continue;
      if (overlaps(a.x, a.y, a.diameter, b.x, b.y, b.diameter)) {
        out.push({ kind: 'orb-orb', a: i as OrbIndex, b: j as OrbIndex });
      }
    }
  }
  return out.length;
}
