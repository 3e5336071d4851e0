import { devWarn } from '../dev-log.ts';
import { orbClass } from '../orb-classes.ts';
import { freeOrbSlot, freePickupSlot, incOrbs, incPickups, orbAt, pickupAt } from '../pools.ts';
import type { Session } from '../session.ts';
import { allocId } from '../session.ts';
import type { OrbClassId, OrbIndex, OrbRecord, PickupIndex, PickupRecord } from '../types.ts';
import { isOrbClassId, NO_ORB, NO_PICKUP } from '../types.ts';

// 生成ポリシー（いつ・どこに・どのクラスを出すか）は外部が持つ。ここはレコードを受け取ってアリーナに載せるだけ。

function assertFinite(label: string, v: number) {
  if (!Number.isFinite(v)) throw new RangeError(`${label} must be finite: ${v}`);
}

/** 新規オーブを登録する。レコードが不正なら RangeError、アリーナ満杯・終了後は NO_ORB */
export function spawnOrb(s: Session, rec: OrbRecord): OrbIndex {
  assertFinite('orb.x', rec.x);
  assertFinite('orb.y', rec.y);
  const vx = rec.vx ?? 0;
  const vy = rec.vy ?? 0;
  assertFinite('orb.vx', vx);
  assertFinite('orb.vy', vy);
  if (!Number.isFinite(rec.diameter) || rec.diameter <= 0) {
    throw new RangeError(`orb.diameter must be positive: ${rec.diameter}`);
  }
  if (!isOrbClassId(rec.cls)) throw new RangeError(`Invalid orb class: ${rec.cls}`);
  if (s.terminal !== null) return NO_ORB;

  const slot = freeOrbSlot(s.orbs);
  if (slot === NO_ORB) {
    devWarn(`orb arena full (${s.orbs.slots.length}), spawn dropped`);
    return NO_ORB;
  }
  const o = orbAt(s.orbs, slot);
  o.alive = true;
  o.id = allocId(s);
  o.x = rec.x;
  o.y = rec.y;
  o.vx = vx;
  o.vy = vy;
  o.fx = 0;
  o.fy = 0;
  o.diameter = rec.diameter;
  o.cls = rec.cls;
  o.points = orbClass(rec.cls).basePoints;
  o.mergeCount = 0;
  o.merged = false;
  o.processed = false;
  o.orbital = false;
  o.orbitPartner = NO_ORB;
  o.orbitalUntil = 0;
  o.danger = false;
  incOrbs(s.orbs);
  return slot;
}

export function spawnPickup(s: Session, rec: PickupRecord): PickupIndex {
  assertFinite('pickup.x', rec.x);
  assertFinite('pickup.y', rec.y);
  const vx = rec.vx ?? 0;
  const vy = rec.vy ?? 0;
  assertFinite('pickup.vx', vx);
  assertFinite('pickup.vy', vy);
  if (s.terminal !== null) return NO_PICKUP;

  const slot = freePickupSlot(s.pickups);
  if (slot === NO_PICKUP) {
    devWarn(`pickup arena full (${s.pickups.slots.length}), spawn dropped`);
    return NO_PICKUP;
  }
  const p = pickupAt(s.pickups, slot);
  p.alive = true;
  p.id = allocId(s);
  p.kind = rec.kind;
  p.x = rec.x;
  p.y = rec.y;
  p.vx = vx;
  p.vy = vy;
  p.diameter = s.config.pickupDiameter;
  p.processed = false;
  incPickups(s.pickups);
  return slot;
}

/** タッチ位置。コレクターは次の tick でこの位置に移る */
export function setCollectorTarget(s: Session, x: number, y: number) {
  assertFinite('target.x', x);
  assertFinite('target.y', y);
  s.collector.targetX = x;
  s.collector.targetY = y;
}

export function followTarget(s: Session) {
  const c = s.collector;
  c.x = c.targetX;
  c.y = c.targetY;
}

export function setTargetClass(s: Session, cls: OrbClassId) {
  if (!isOrbClassId(cls)) throw new RangeError(`Invalid orb class: ${cls}`);
  if (s.collector.targetClass === cls) return;
  s.collector.targetClass = cls;
  s.sink.onTargetClassChanged(cls);
}
