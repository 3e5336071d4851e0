import { devError } from '../dev-log.ts';
import {
  clearOrb,
  clearPickup,
  decOrbs,
  decPickups,
  orbAt,
  pickupAt,
  snapshotOrb,
} from '../pools.ts';
import type { Session } from '../session.ts';
import type { OrbIndex, OrbRemovalCause, PickupIndex } from '../types.ts';
import { NO_ORB } from '../types.ts';
import { distSq } from '../vec.ts';

// 削除は2段階: retire で processed を立てて通知（スロットは占有したまま）、
// 走査が終わってから sweepRemovals でまとめて解放する。走査中のコレクションは変更しない。

/**
 * オーブを削除予定にする。既に processed なら何もしない（false）。
 * 合体済みオーブなら理由を問わず ledger の枠を返す（activeMergedCount は生存中の合体オーブ数と一致する）
 */
export function retireOrb(s: Session, i: OrbIndex, cause: OrbRemovalCause): boolean {
  const o = orbAt(s.orbs, i);
  if (!o.alive || o.processed) return false;
  o.processed = true;
  if (o.merged) {
    if (s.ledger.activeMergedCount > 0) {
      s.ledger.activeMergedCount--;
    } else {
      devError(`merge ledger underflow while retiring orb #${o.id}`);
    }
  }
  s.sink.onOrbRemoved(snapshotOrb(i, o), cause);
  return true;
}

export function retirePickup(s: Session, i: PickupIndex): boolean {
  const p = pickupAt(s.pickups, i);
  if (!p.alive || p.processed) return false;
  p.processed = true;
  return true;
}

/** processed なスロットを解放し、解放されたオーブを指していた軌道パートナー参照を外す */
export function sweepRemovals(s: Session) {
  const pool = s.orbs;
  let released = 0;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (!o.processed) continue;
    clearOrb(o);
    decOrbs(pool);
    released++;
  }
  if (released > 0) {
    for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
      const o = orbAt(pool, i);
      if (!o.alive) continue;
      rem--;
      if (o.orbitPartner !== NO_ORB && !orbAt(pool, o.orbitPartner).alive) o.orbitPartner = NO_ORB;
    }
  }

  const pickups = s.pickups;
  for (let i = 0, rem = pickups.count; i < pickups.slots.length && rem > 0; i++) {
    const p = pickupAt(pickups, i);
    if (!p.alive) continue;
    rem--;
    if (!p.processed) continue;
    clearPickup(p);
    decPickups(pickups);
  }
}

/** コレクターから遠すぎるオーブ・ピックアップを除去する。除去距離はコレクターの大きさに比例して伸びる */
export function pruneOutOfRange(s: Session) {
  const c = s.collector;
  const cfg = s.config;
  const limit = Math.max(cfg.orbPruneDistance, c.diameter * cfg.orbPruneDiameterFactor);
  const limitSq = limit * limit;
  const pool = s.orbs;
  for (let i = 0, rem = pool.count; i < pool.slots.length && rem > 0; i++) {
    const o = orbAt(pool, i);
    if (!o.alive) continue;
    rem--;
    if (o.processed) continue;
    if (distSq(c.x, c.y, o.x, o.y) > limitSq) retireOrb(s, i as OrbIndex, 'pruned');
  }

  const pickupLimitSq = cfg.pickupPruneDistance * cfg.pickupPruneDistance;
  const pickups = s.pickups;
  for (let i = 0, rem = pickups.count; i < pickups.slots.length && rem > 0; i++) {
    const p = pickupAt(pickups, i);
    if (!p.alive) continue;
    rem--;
    if (p.processed) continue;
    if (distSq(c.x, c.y, p.x, p.y) > pickupLimitSq) retirePickup(s, i as PickupIndex);
  }

  sweepRemovals(s);
}
