export function distSq(ax: number, ay: number, bx: number, by: number): number {
  const dx = bx - ax,
    dy = by - ay;
  return dx * dx + dy * dy;
}

/** 円の面積に比例する質量。倍率はクラスごとの値 */
export function bodyMass(diameter: number, massMultiplier: number): number {
  const r = diameter / 2;
  return r * r * massMultiplier;
}
