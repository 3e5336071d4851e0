// ── 配置基準 ──
// ここには「複数モジュールから参照される定数」のみを置く。
//   例: アリーナ容量、サブステップ基準FPS、クラス数
// ゲームバランス調整値（成長係数・合体条件など）は config.ts の DEFAULT_CONFIG に置く。

export const POOL_ORBS = 128;
export const POOL_PICKUPS = 4;
export const ORB_CLASS_COUNT = 5;

export const REF_FPS = 30;
export const MAX_STEPS_PER_FRAME = 8;

/** コレクターの質量倍率（オーブはクラスごとに orb-classes.ts で定義） */
export const COLLECTOR_MASS_MULTIPLIER = 1;
