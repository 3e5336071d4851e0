export type { SimConfig } from './config.ts';
export { createConfig, DEFAULT_CONFIG, validateConfig } from './config.ts';
export { MAX_STEPS_PER_FRAME, POOL_ORBS, POOL_PICKUPS, REF_FPS } from './constants.ts';
export type { EventHub, EventSink } from './events.ts';
export { createEventHub, createEventSink } from './events.ts';
export { classForDiameter, ORB_CLASSES, orbClass, orbMass } from './orb-classes.ts';
export type { OrbPool, PickupPool } from './pools.ts';
export { orbAt, pickupAt, snapshotOrb } from './pools.ts';
export type { Session, SessionOptions, SessionStats } from './session.ts';
export { createSession, isTerminal } from './session.ts';
export type { Contact, ConsumeOutcome, OrbContactOutcome } from './simulation/collision.ts';
export {
  resolveCollectorOrb,
  resolveCollectorPickup,
  resolveContact,
  resolveContacts,
  resolveOrbOrb,
} from './simulation/collision.ts';
export { detectContacts } from './simulation/contacts.ts';
export { applyCollectorGravity, applyGravity, applyOrbGravity } from './simulation/gravity.ts';
export { canConsume, grow, passiveShrink, shrink, sizeMultiplier } from './simulation/growth.ts';
export { integrate } from './simulation/integrate.ts';
export type { MergeDecline, MergeOutcome } from './simulation/merge.ts';
export { checkMergeSafeguards, fusedDiameter, tryMerge } from './simulation/merge.ts';
export { deflect, updateOrbitals } from './simulation/orbital.ts';
export { activatePowerUp, isFrozen, isRainbow, remainingTime, updatePowerUp } from './simulation/power-up.ts';
export { pruneOutOfRange, sweepRemovals } from './simulation/prune.ts';
export { setCollectorTarget, setTargetClass, spawnOrb, spawnPickup } from './simulation/spawn.ts';
export { pause, resume, update } from './simulation/update.ts';
export type {
  Collector,
  GameOverReason,
  MergeLedger,
  Orb,
  OrbClass,
  OrbClassId,
  OrbIndex,
  OrbRecord,
  OrbRemovalCause,
  OrbSnapshot,
  Pickup,
  PickupIndex,
  PickupRecord,
  PowerUpEffect,
  PowerUpKind,
} from './types.ts';
export { isOrbClassId, NO_ORB, NO_PICKUP, ORB_CLASS_IDS } from './types.ts';
