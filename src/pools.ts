import { POOL_ORBS, POOL_PICKUPS } from './constants.ts';
import type { Orb, OrbIndex, OrbSnapshot, Pickup, PickupIndex } from './types.ts';
import { NO_ORB, NO_PICKUP } from './types.ts';

// セッションごとの固定長アリーナ。スロットは事前確保し alive フラグで管理する。
// 外部（描画層）はインデックスではなく id で個体を識別すること（スロットは再利用される）。

export interface OrbPool {
  readonly slots: readonly Orb[];
  count: number;
}

export interface PickupPool {
  readonly slots: readonly Pickup[];
  count: number;
}

function blankOrb(): Orb {
  return {
    alive: false,
    id: 0,
    x: 0,
    y: 0,
    vx: 0,
    vy: 0,
    fx: 0,
    fy: 0,
    diameter: 0,
    cls: 0,
    points: 0,
    mergeCount: 0,
    merged: false,
    processed: false,
    orbital: false,
    orbitPartner: NO_ORB,
    orbitalUntil: 0,
    danger: false,
  };
}

function blankPickup(): Pickup {
  return { alive: false, id: 0, kind: 'rainbow', x: 0, y: 0, vx: 0, vy: 0, diameter: 0, processed: false };
}

export function createOrbPool(capacity: number = POOL_ORBS): OrbPool {
  if (!Number.isInteger(capacity) || capacity <= 0) throw new RangeError(`orb pool capacity invalid: ${capacity}`);
  const slots: Orb[] = [];
  for (let i = 0; i < capacity; i++) slots.push(blankOrb());
  return { slots, count: 0 };
}

export function createPickupPool(capacity: number = POOL_PICKUPS): PickupPool {
  if (!Number.isInteger(capacity) || capacity <= 0) throw new RangeError(`pickup pool capacity invalid: ${capacity}`);
  const slots: Pickup[] = [];
  for (let i = 0; i < capacity; i++) slots.push(blankPickup());
  return { slots, count: 0 };
}

export function orbAt(pool: OrbPool, i: number): Orb {
  const o = pool.slots[i];
  if (o === undefined) throw new RangeError(`Invalid orb index: ${i}`);
  return o;
}

export function pickupAt(pool: PickupPool, i: number): Pickup {
  const p = pool.slots[i];
  if (p === undefined) throw new RangeError(`Invalid pickup index: ${i}`);
  return p;
}

export function incOrbs(pool: OrbPool) {
  if (pool.count >= pool.slots.length) throw new RangeError(`orbCount at pool limit (${pool.slots.length})`);
  pool.count++;
}
export function decOrbs(pool: OrbPool) {
  if (pool.count <= 0) throw new RangeError('orbCount already 0');
  pool.count--;
}
export function incPickups(pool: PickupPool) {
  if (pool.count >= pool.slots.length) throw new RangeError(`pickupCount at pool limit (${pool.slots.length})`);
  pool.count++;
}
export function decPickups(pool: PickupPool) {
  if (pool.count <= 0) throw new RangeError('pickupCount already 0');
  pool.count--;
}

/** 最小インデックスの空きスロット。満杯なら NO_ORB */
export function freeOrbSlot(pool: OrbPool): OrbIndex {
  for (let i = 0; i < pool.slots.length; i++) {
    if (!orbAt(pool, i).alive) return i as OrbIndex;
  }
  return NO_ORB;
}

export function freePickupSlot(pool: PickupPool): PickupIndex {
  for (let i = 0; i < pool.slots.length; i++) {
    if (!pickupAt(pool, i).alive) return i as PickupIndex;
  }
  return NO_PICKUP;
}

/** スロットを初期状態に戻す（alive=false）。カウンタは呼び出し側で減らす */
export function clearOrb(o: Orb) {
  Object.assign(o, blankOrb());
}

export function clearPickup(p: Pickup) {
  Object.assign(p, blankPickup());
}

export function snapshotOrb(i: OrbIndex, o: Orb): OrbSnapshot {
  return {
    index: i,
    id: o.id,
    x: o.x,
    y: o.y,
    vx: o.vx,
    vy: o.vy,
    diameter: o.diameter,
    cls: o.cls,
    points: o.points,
    mergeCount: o.mergeCount,
    merged: o.merged,
  };
}
