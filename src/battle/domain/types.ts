export type CombatantId = string;
export type FactionId = string;

export const PLAYER_FACTION_ID: FactionId = "player";

export type Point = { x: number; y: number };

export type RelationshipType = "ALLY" | "NEUTRAL" | "HOSTILE";

export type UnitType = "SOLDIER" | "BEAST" | "MAGI";

export type WeaponFamily = "SWORD" | "AXE" | "SPEAR" | "DAGGER" | "BOW" | "STAFF" | "UNARMED";

export interface CombatStats {
  maxHp: number;
  attackPower: number;
  defensePower: number;
  speed: number;
  luck: number;
  finesse: number;
  focus: number;
  movement: number;
}

// ---- skills ----

export type SkillKind = "ATTACK" | "SUPPORT";

export interface EffectApplication {
  effectId: string;
  duration: number;
}

export interface HazardSpec {
  damage: number;
  rounds: number;
}

export type AreaPattern = "LINE_LIMITED" | "LINE_PASSTHROUGH" | "CLOUD" | "FAN";

export interface SkillArea {
  pattern: AreaPattern;
  /** line length, cloud radius or fan depth, in cells */
  size: number;
  /** where a cloud is centred; lines and fans always start at the user */
  origin: "SOURCE" | "TARGET";
}

export interface SkillDefinition {
  id: string;
  name: string;
  kind: SkillKind;
  range: number;
  baseDamage: number;
  /** fraction of the user's attack power added to baseDamage */
  statScaling: number;
  healing: number;
  appliesEffect?: EffectApplication;
  createsHazard?: HazardSpec;
  area?: SkillArea;
  /** empty or missing: any unit type may use it */
  suitableFor?: UnitType[];
}

// ---- encounter ----

export type VictoryCondition =
  | { type: "KILL_ALL" }
  | { type: "SURVIVE_ROUNDS"; rounds: number }
  | { type: "PROTECT_TARGET"; targetId: CombatantId }
  | { type: "REACH_LOCATION"; location: Point };

export interface EncounterConfig {
  victory: VictoryCondition;
  /** 0 or missing: no limit */
  roundLimit?: number;
}

export const DEFAULT_ENCOUNTER: EncounterConfig = { victory: { type: "KILL_ALL" } };

// ---- combat ----

export interface CombatResolutionResult {
  hit: boolean;
  parried: boolean;
  criticalHit: boolean;
  criticalDefended: boolean;
  finalDamage: number;
}

export type BattlePhase = "NOT_STARTED" | "WINDOW_ACTIVE" | "COMBAT_OVER";

export interface CombatOutcome {
  over: boolean;
  playerVictory?: boolean;
}

export type ActionKind = "MELEE_ATTACK" | "RANGED_SKILL" | "SUPPORT" | "MOVE" | "WAIT";

export type ActionReport =
  | { ok: true; result?: CombatResolutionResult; healed?: number; affected?: CombatantId[] }
  | { ok: false; reason: string };
