import { orbClass } from '../orb-classes.ts';
import { orbAt, pickupAt, snapshotOrb } from '../pools.ts';
import type { Session } from '../session.ts';
import { addScore, endSession } from '../session.ts';
import type { OrbIndex, PickupIndex } from '../types.ts';
import { canConsume, grow, shrink, sizeMultiplier } from './growth.ts';
import { tryMerge } from './merge.ts';
import { deflect } from './orbital.ts';
import { activatePowerUp, isRainbow } from './power-up.ts';
import { retireOrb, retirePickup, sweepRemovals } from './prune.ts';

/** 接触イベント。物理エンジン側の検出結果もこの形に詰め替えて渡す */
export type Contact =
  | { readonly kind: 'collector-orb'; readonly orb: OrbIndex }
  | { readonly kind: 'orb-orb'; readonly a: OrbIndex; readonly b: OrbIndex }
  | { readonly kind: 'collector-pickup'; readonly pickup: PickupIndex };

export type ConsumeOutcome = 'ignored' | 'destabilized' | 'grown' | 'forgiven' | 'shrunk' | 'too-small';
export type OrbContactOutcome = 'ignored' | 'merged' | 'deflected' | 'declined';

function inGracePeriod(s: Session, now: number): boolean {
  return now - s.lastConsumeAt < s.config.gracePeriod;
}

/**
 * コレクター ↔ オーブ。判定順: サイズ（大きすぎれば即終了）→ クラス（一致またはレインボー）
 * → 猶予期間 → 縮小とペナルティ
 */
export function resolveCollectorOrb(s: Session, i: OrbIndex, now: number): ConsumeOutcome {
  if (s.terminal !== null) return 'ignored';
  const o = orbAt(s.orbs, i);
  if (!o.alive || o.processed) return 'ignored';
  const snap = snapshotOrb(i, o);
  const c = s.collector;
  const cfg = s.config;
  retireOrb(s, i, 'consumed');

  if (!canConsume(c.diameter, o.diameter)) {
    endSession(s, 'destabilized');
    return 'destabilized';
  }

  const byClass = s.stats.consumedByClass;
  byClass[o.cls] = (byClass[o.cls] ?? 0) + 1;
  const before = c.diameter;

  if (o.cls === c.targetClass || isRainbow(s)) {
    c.diameter = grow(before, o.diameter, cfg);
    s.lastConsumeAt = now;
    s.stats.correct++;
    s.sink.onCollectorGrown(before, c.diameter);
    // 支払いはクラスの基本点。合体オーブの points は合体チェーン用の値で、ここでは使わない
    addScore(s, orbClass(o.cls).basePoints * sizeMultiplier(c.diameter, cfg));
    s.sink.onOrbConsumed(snap, true);
    return 'grown';
  }

  if (inGracePeriod(s, now)) {
    s.stats.forgiven++;
    s.sink.onOrbConsumed(snap, false);
    return 'forgiven';
  }

  c.diameter = shrink(before, cfg.shrinkMultiplier, cfg);
  s.stats.wrong++;
  s.sink.onCollectorShrunk(before, c.diameter);
  addScore(s, cfg.wrongClassPenalty);
  s.sink.onOrbConsumed(snap, false);
  if (c.diameter <= cfg.minDiameter) {
    endSession(s, 'too-small');
    return 'too-small';
  }
  return 'shrunk';
}

function arePartners(s: Session, ia: OrbIndex, ib: OrbIndex): boolean {
  const a = orbAt(s.orbs, ia);
  const b = orbAt(s.orbs, ib);
  return (a.orbital && a.orbitPartner === ib) || (b.orbital && b.orbitPartner === ia);
}

/** オーブ ↔ オーブ。合体を試み、見送られたら軌道偏向に回す */
export function resolveOrbOrb(s: Session, ia: OrbIndex, ib: OrbIndex, now: number): OrbContactOutcome {
  if (s.terminal !== null || ia === ib) return 'ignored';
  const a = orbAt(s.orbs, ia);
  const b = orbAt(s.orbs, ib);
  if (!a.alive || !b.alive || a.processed || b.processed) return 'ignored';
  if (arePartners(s, ia, ib)) return 'ignored';
  if (tryMerge(s, ia, ib, now).accepted) return 'merged';
  return deflect(s, ia, ib, now) ? 'deflected' : 'declined';
}

/** コレクター ↔ ピックアップ。サイズ・クラス判定なし */
export function resolveCollectorPickup(s: Session, i: PickupIndex, now: number): boolean {
  if (s.terminal !== null) return false;
  const p = pickupAt(s.pickups, i);
  if (!retirePickup(s, i)) return false;
  s.sink.onPowerUpCollected(p.kind);
  activatePowerUp(s, p.kind, now);
  return true;
}

export function resolveContact(s: Session, c: Contact, now: number) {
  switch (c.kind) {
    case 'collector-orb':
      resolveCollectorOrb(s, c.orb, now);
      break;
    case 'orb-orb':
      resolveOrbOrb(s, c.a, c.b, now);
      break;
    case 'collector-pickup':
      resolveCollectorPickup(s, c.pickup, now);
      break;
    default: {
      const _exhaustive: never = c;
      throw new Error(`Unknown contact: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** 1バッチ分の接触を順に解決し、最後に削除予定のスロットをまとめて解放する */
export function resolveContacts(s: Session, contacts: readonly Contact[], now: number) {
  for (const c of contacts) resolveContact(s, c, now);
  sweepRemovals(s);
}
