import { devLog } from '../dev-log.ts';
import { classForDiameter } from '../orb-classes.ts';
import { freeOrbSlot, incOrbs, orbAt, snapshotOrb } from '../pools.ts';
import type { Session } from '../session.ts';
import { allocId } from '../session.ts';
import type { OrbIndex } from '../types.ts';
import { NO_ORB } from '../types.ts';
import { distSq } from '../vec.ts';
import { retireOrb } from './prune.ts';

/** 合体を見送った理由。安全装置の判定順に並ぶ */
export type MergeDecline =
  | 'ledger-full'
  | 'cooldown'
  | 'too-small'
  | 'merge-limit'
  | 'near-collector'
  | 'pool-full';

export type MergeOutcome =
  | { readonly accepted: true; readonly result: OrbIndex }
  | { readonly accepted: false; readonly reason: MergeDecline };

/** 面積保存（直交和）。合体後の円の面積は2つの親の面積の和 */
export function fusedDiameter(d1: number, d2: number): number {
  const r1 = d1 / 2,
    r2 = d2 / 2;
  return 2 * Math.sqrt(r1 * r1 + r2 * r2);
}

export function fusedPoints(s: Session, p1: number, p2: number): number {
  return Math.floor((p1 + p2) * s.config.mergedPointsMultiplier);
}

/** 5つの安全装置を順に判定し、最初に引っかかった理由を返す。全て通れば null */
export function checkMergeSafeguards(s: Session, ia: OrbIndex, ib: OrbIndex, now: number): MergeDecline | null {
  const cfg = s.config;
  const a = orbAt(s.orbs, ia);
  const b = orbAt(s.orbs, ib);
  if (s.ledger.activeMergedCount >= cfg.maxMergedOrbs) return 'ledger-full';
  if (now - s.ledger.lastMergeTimestamp <= cfg.mergeCooldown) return 'cooldown';
  if (a.diameter < cfg.minMergeSize || b.diameter < cfg.minMergeSize) return 'too-small';
  if (a.mergeCount >= cfg.maxMergesPerOrb || b.mergeCount >= cfg.maxMergesPerOrb) return 'merge-limit';
  const c = s.collector;
  const exclSq = cfg.mergeExclusionRadius * cfg.mergeExclusionRadius;
  if (distSq(c.x, c.y, a.x, a.y) <= exclSq || distSq(c.x, c.y, b.x, b.y) <= exclSq) return 'near-collector';
  return null;
}

/**
 * 2つのオーブの合体を試みる。成功時は親2つを削除予定にし、
 * 大きい方の親の位置に新しい合体オーブを生成する
 */
export function tryMerge(s: Session, ia: OrbIndex, ib: OrbIndex, now: number): MergeOutcome {
  const declined = checkMergeSafeguards(s, ia, ib, now);
  if (declined !== null) return { accepted: false, reason: declined };
  // 親はまだスロットを占有しているので、空きは親とは別に1つ必要
  const slot = freeOrbSlot(s.orbs);
  if (slot === NO_ORB) return { accepted: false, reason: 'pool-full' };

  const cfg = s.config;
  const a = orbAt(s.orbs, ia);
  const b = orbAt(s.orbs, ib);
  const larger = a.diameter >= b.diameter ? a : b;
  const diameter = fusedDiameter(a.diameter, b.diameter);

  const o = orbAt(s.orbs, slot);
  o.alive = true;
  o.id = allocId(s);
  o.x = larger.x;
  o.y = larger.y;
  o.vx = ((a.vx + b.vx) / 2) * cfg.mergeVelocityDamping;
  o.vy = ((a.vy + b.vy) / 2) * cfg.mergeVelocityDamping;
  o.fx = 0;
  o.fy = 0;
  o.diameter = diameter;
  o.cls = classForDiameter(diameter);
  o.points = fusedPoints(s, a.points, b.points);
  o.mergeCount = Math.max(a.mergeCount, b.mergeCount) + 1;
  o.merged = true;
  o.processed = false;
  o.orbital = false;
  o.orbitPartner = NO_ORB;
  o.orbitalUntil = 0;
  o.danger = false;
  incOrbs(s.orbs);

  const snapA = snapshotOrb(ia, a);
  const snapB = snapshotOrb(ib, b);
  retireOrb(s, ia, 'merged');
  retireOrb(s, ib, 'merged');

  s.ledger.activeMergedCount++;
  s.ledger.lastMergeTimestamp = now;
  s.stats.merges++;
  devLog(`merge #${snapA.id} + #${snapB.id} -> #${o.id} (d=${diameter.toFixed(1)}, cls=${o.cls})`);
  s.sink.onMergeSucceeded(snapA, snapB, snapshotOrb(slot, o));
  return { accepted: true, result: slot };
}
