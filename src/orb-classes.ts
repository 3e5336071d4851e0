import type { OrbClass, OrbClassId } from './types.ts';
import { bodyMass } from './vec.ts';

// 順序は階級順（小 → 大）。ID は外部のスポーンポリシー・描画層と共有するため並べ替え禁止
export const ORB_CLASSES: readonly OrbClass[] = [
  { name: 'White Dwarf', basePoints: 50, massMultiplier: 0.3, minSize: 16, maxSize: 24 },
  { name: 'Yellow Dwarf', basePoints: 100, massMultiplier: 1.0, minSize: 28, maxSize: 38 },
  // massMultiplier は階級順に単調ではない（Blue Giant > Orange Giant）
  { name: 'Blue Giant', basePoints: 200, massMultiplier: 8.0, minSize: 55, maxSize: 75 },
  { name: 'Orange Giant', basePoints: 400, massMultiplier: 2.5, minSize: 120, maxSize: 300 },
  { name: 'Red Supergiant', basePoints: 1000, massMultiplier: 15.0, minSize: 280, maxSize: 900 },
];

/** 合体後の直径からクラスを決める閾値（below 未満ならそのクラス）。該当なしは Red Supergiant */
const FUSED_CLASS_THRESHOLDS: readonly { readonly cls: OrbClassId; readonly below: number }[] = [
  { cls: 0, below: 35 },
  { cls: 1, below: 50 },
  { cls: 2, below: 75 },
  { cls: 3, below: 150 },
];

export function orbClass(cls: OrbClassId): OrbClass {
  const c = ORB_CLASSES[cls];
  if (c === undefined) throw new RangeError(`Invalid orb class: ${cls}`);
  return c;
}

export function classForDiameter(diameter: number): OrbClassId {
  for (const t of FUSED_CLASS_THRESHOLDS) {
    if (diameter < t.below) return t.cls;
  }
  return 4;
}

export function orbMass(diameter: number, cls: OrbClassId): number {
  return bodyMass(diameter, orbClass(cls).massMultiplier);
}
