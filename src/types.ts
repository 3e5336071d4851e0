export interface Collector {
  x: number;
  y: number;
  targetX: number;
  targetY: number;
  diameter: number;
  targetClass: OrbClassId;
}

export interface Orb {
  alive: boolean;
  id: number;
  x: number;
  y: number;
  vx: number;
  vy: number;
  fx: number;
  fy: number;
  diameter: number;
  cls: OrbClassId;
  points: number;
  mergeCount: number;
  merged: boolean;
  /**
   * 同一 tick 内の重複接触を無視するための冪等ガード。
   * 消費・合体で true になり、掃引（sweepRemovals）でスロットが解放されるまで維持される。
   */
  processed: boolean;
  orbital: boolean;
  orbitPartner: OrbIndex;
  orbitalUntil: number;
  danger: boolean;
}

export interface Pickup {
  alive: boolean;
  id: number;
  kind: PowerUpKind;
  x: number;
  y: number;
  vx: number;
  vy: number;
  diameter: number;
  processed: boolean;
}

export interface OrbClass {
  name: string;
  basePoints: number;
  massMultiplier: number;
  minSize: number;
  maxSize: number;
}

/** 外部スポーンポリシーから受け取る新規オーブのレコード */
export interface OrbRecord {
  x: number;
  y: number;
  diameter: number;
  cls: OrbClassId;
  vx?: number;
  vy?: number;
}

export interface PickupRecord {
  kind: PowerUpKind;
  x: number;
  y: number;
  vx?: number;
  vy?: number;
}

/** イベント通知用のオーブのスナップショット（アリーナのスロットは再利用されるため） */
export interface OrbSnapshot {
  readonly index: OrbIndex;
  readonly id: number;
  readonly x: number;
  readonly y: number;
  readonly vx: number;
  readonly vy: number;
  readonly diameter: number;
  readonly cls: OrbClassId;
  readonly points: number;
  readonly mergeCount: number;
  readonly merged: boolean;
}

export interface MergeLedger {
  activeMergedCount: number;
  lastMergeTimestamp: number;
}

export type PowerUpKind = 'rainbow' | 'freeze';

export interface PowerUpEffect {
  kind: PowerUpKind | 'none';
  expiresAt: number;
}

export type GameOverReason = 'destabilized' | 'too-small' | 'collapsed';
export type OrbRemovalCause = 'consumed' | 'merged' | 'pruned';

export type OrbClassId = 0 | 1 | 2 | 3 | 4;
export const ORB_CLASS_IDS: readonly OrbClassId[] = [0, 1, 2, 3, 4];

/** アリーナインデックスの branded type（オーブとピックアップのインデックス混用を防止） */
export type OrbIndex = number & { readonly __brand: 'OrbIndex' };
export type PickupIndex = number & { readonly __brand: 'PickupIndex' };

/** スロットなし / パートナーなしを示すセンチネル値 */
export const NO_ORB = -1 as OrbIndex;
export const NO_PICKUP = -1 as PickupIndex;

export function isOrbClassId(v: number): v is OrbClassId {
  return Number.isInteger(v) && v >= 0 && v <= 4;
}
