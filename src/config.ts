// 調整済みのゲームバランス定数。導出根拠は残っていないが手触りがこの値に依存しているため、
// 丸めたり式を整理したりしないこと。

export interface SimConfig {
  // コレクター
  readonly initialDiameter: number;
  readonly minDiameter: number;
  readonly shrinkMultiplier: number;
  readonly gracePeriod: number;

  // 成長
  readonly growthBase: number;
  readonly growthRelativeCoeff: number;
  readonly growthPenaltyScale: number;
  readonly forgivenessScale: number;
  readonly forgivenessCap: number;
  readonly forgivenessWeight: number;

  // 受動縮小（0 で無効）
  readonly passiveShrinkRate: number;
  readonly maxPassiveShrinkDt: number;

  // 重力
  readonly gravitationalConstant: number;
  readonly gravityMaxDistance: number;
  readonly orbGravityMultiplier: number;
  readonly orbGravityRange: number;
  readonly orbLinearDamping: number;

  // 合体
  readonly maxMergedOrbs: number;
  readonly mergeCooldown: number;
  readonly minMergeSize: number;
  readonly maxMergesPerOrb: number;
  readonly mergeExclusionRadius: number;
  readonly mergedPointsMultiplier: number;
  readonly mergeVelocityDamping: number;

  // 軌道偏向
  readonly orbitalSpeedMultiplier: number;
  readonly orbitalDuration: number;
  readonly escapeSpeedMultiplier: number;
  readonly orbitalVelocityInheritance: number;

  // パワーアップ
  readonly rainbowDuration: number;
  readonly freezeDuration: number;
  readonly pickupDiameter: number;

  // スコア
  readonly wrongClassPenalty: number;
  readonly scoreSizeStep: number;

  // 範囲外除去・警告
  readonly orbPruneDistance: number;
  readonly orbPruneDiameterFactor: number;
  readonly pickupPruneDistance: number;
  readonly dangerDistance: number;
}

export const DEFAULT_CONFIG: Readonly<SimConfig> = Object.freeze({
  initialDiameter: 40,
  minDiameter: 30,
  shrinkMultiplier: 0.8,
  gracePeriod: 0.5,

  growthBase: 0.01467428,
  growthRelativeCoeff: 0.05135996,
  growthPenaltyScale: 600,
  forgivenessScale: 200,
  forgivenessCap: 0.5,
  forgivenessWeight: 0.1,

  passiveShrinkRate: 0.1,
  maxPassiveShrinkDt: 0.25,

  gravitationalConstant: 800,
  gravityMaxDistance: 500,
  orbGravityMultiplier: 0.15,
  orbGravityRange: 250,
  orbLinearDamping: 0.3,

  maxMergedOrbs: 10,
  mergeCooldown: 1.5,
  minMergeSize: 20,
  maxMergesPerOrb: 3,
  mergeExclusionRadius: 100,
  mergedPointsMultiplier: 1.5,
  mergeVelocityDamping: 0.7,

  orbitalSpeedMultiplier: 1.2,
  orbitalDuration: 0.4,
  escapeSpeedMultiplier: 1.5,
  orbitalVelocityInheritance: 0.3,

  rainbowDuration: 5,
  freezeDuration: 6,
  pickupDiameter: 15,

  wrongClassPenalty: -50,
  scoreSizeStep: 60,

  orbPruneDistance: 1000,
  orbPruneDiameterFactor: 10,
  pickupPruneDistance: 3000,
  dangerDistance: 300,
});

type ConfigKey = keyof SimConfig;

// 0 を許容するキー（それ以外の数値は正であること）
const NON_NEGATIVE_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>([
  'gracePeriod',
  'passiveShrinkRate',
  'orbLinearDamping',
  'maxMergedOrbs',
  'mergeCooldown',
  'minMergeSize',
  'maxMergesPerOrb',
  'mergeExclusionRadius',
  'orbitalVelocityInheritance',
  'growthBase',
  'forgivenessCap',
  'forgivenessWeight',
]);

const UNIT_INTERVAL_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>([
  'shrinkMultiplier',
  'mergeVelocityDamping',
  'orbitalVelocityInheritance',
]);

const INTEGER_KEYS: ReadonlySet<ConfigKey> = new Set<ConfigKey>(['maxMergedOrbs', 'maxMergesPerOrb']);

function isConfigKey(key: string): key is ConfigKey {
  return key in DEFAULT_CONFIG;
}

function validateKey(cfg: SimConfig, key: ConfigKey) {
  const v = cfg[key];
  if (!Number.isFinite(v)) throw new RangeError(`config.${key} must be finite: ${v}`);
  if (key === 'wrongClassPenalty') {
    if (v > 0) throw new RangeError(`config.wrongClassPenalty must not be positive: ${v}`);
    return;
  }
  if (NON_NEGATIVE_KEYS.has(key) ? v < 0 : v <= 0) throw new RangeError(`config.${key} out of range: ${v}`);
  if (UNIT_INTERVAL_KEYS.has(key) && v > 1) throw new RangeError(`config.${key} must be <= 1: ${v}`);
  if (INTEGER_KEYS.has(key) && !Number.isInteger(v)) throw new RangeError(`config.${key} must be an integer: ${v}`);
}

/** 設定値の契約チェック。セッション生成時に一度だけ呼ばれ、違反は RangeError */
export function validateConfig(cfg: SimConfig): void {
  for (const key of Object.keys(DEFAULT_CONFIG)) {
    if (isConfigKey(key)) validateKey(cfg, key);
  }
  if (cfg.initialDiameter <= cfg.minDiameter) {
    throw new RangeError(
      `config.initialDiameter (${cfg.initialDiameter}) must exceed minDiameter (${cfg.minDiameter})`,
    );
  }
  if (cfg.orbGravityRange > cfg.gravityMaxDistance) {
    throw new RangeError('config.orbGravityRange must not exceed gravityMaxDistance');
  }
}

export function createConfig(overrides: Partial<SimConfig> = {}): Readonly<SimConfig> {
  const cfg: SimConfig = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(cfg);
  return Object.freeze(cfg);
}
