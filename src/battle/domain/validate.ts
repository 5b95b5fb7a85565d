import { BEHAVIOR_KINDS, type BehaviorConfig } from "../ai/behaviors/behaviorConfig";
import type { CombatConstants } from "./combatConstants";
import { DEFAULT_COMBAT_CONSTANTS } from "./combatConstants";
import { isWeaponFamily } from "./combatant";
import { ValidationError } from "./errors";
import type { FactionDefinition } from "./factionRelations";
import { isProficiencyTier, type ProficiencyTier } from "./proficiency";
import type {
  CombatantId,
  CombatStats,
  EffectApplication,
  EncounterConfig,
  FactionId,
  Point,
  RelationshipType,
  UnitType,
  VictoryCondition,
  WeaponFamily,
} from "./types";

// ---- request shapes ----

export interface UnitSpec {
  id: CombatantId;
  name?: string;
  faction_id: FactionId;
  unit_type?: UnitType;
  position: Point;
  stats: CombatStats;
  hp?: number;
  weapon_family?: WeaponFamily;
  proficiency?: Partial<Record<WeaponFamily, ProficiencyTier | number>>;
  behavior?: BehaviorConfig;
  /** ids from the skill library */
  skills?: string[];
  effects?: EffectApplication[];
}

export interface RelationshipSpec {
  a: FactionId;
  b: FactionId;
  type: RelationshipType;
}

export interface HazardPlacement {
  at: Point;
  damage: number;
  rounds: number;
}

export interface CreateBattleRequest {
  units: UnitSpec[];
  grid: { width: number; height: number; blocked?: Point[] };
  factions?: FactionDefinition[];
  relationships?: RelationshipSpec[];
  encounter?: EncounterConfig;
  hazards?: HazardPlacement[];
  seed?: number;
  player_faction_id?: FactionId;
  constants?: Partial<CombatConstants>;
}

export type BattleActionRequest =
  | { type: "ATTACK"; actor_id: CombatantId; target_id: CombatantId }
  | { type: "SKILL"; actor_id: CombatantId; skill_id: string; target_id: CombatantId }
  | { type: "MOVE"; actor_id: CombatantId; destination: Point }
  | { type: "END_TURN"; actor_id: CombatantId };

// ---- primitives ----

type Obj = Record<string, unknown>;

export function isRecord(value: unknown): value is Obj {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const UNIT_TYPES: readonly UnitType[] = ["SOLDIER", "BEAST", "MAGI"];
const RELATIONSHIPS: readonly RelationshipType[] = ["ALLY", "NEUTRAL", "HOSTILE"];

export function isUnitType(value: unknown): value is UnitType {
  return typeof value === "string" && UNIT_TYPES.some((t) => t === value);
}

function isRelationship(value: unknown): value is RelationshipType {
  return typeof value === "string" && RELATIONSHIPS.some((r) => r === value);
}

function requireObject(value: unknown, path: string): Obj {
  if (!isRecord(value)) throw new ValidationError(`${path} must be an object`);
  return value;
}

function requireArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new ValidationError(`${path} must be an array`);
  return value;
}

function requireString(obj: Obj, key: string, path: string): string {
  const v = obj[key];
  if (typeof v !== "string" || v.length === 0) throw new ValidationError(`${path}.${key} is required`);
  return v;
}

function optionalString(obj: Obj, key: string, path: string): string | undefined {
  const v = obj[key];
  if (v == null) return undefined;
  if (typeof v !== "string") throw new ValidationError(`${path}.${key} must be a string`);
  return v;
}

function requireNumber(obj: Obj, key: string, path: string, opts: { min?: number; integer?: boolean } = {}): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) throw new ValidationError(`${path}.${key} must be a finite number`);
  if (opts.integer && !Number.isInteger(v)) throw new ValidationError(`${path}.${key} must be an integer`);
  if (opts.min != null && v < opts.min) throw new ValidationError(`${path}.${key} must be >= ${opts.min}`);
  return v;
}

function optionalNumber(obj: Obj, key: string, path: string, opts: { min?: number; integer?: boolean } = {}): number | undefined {
  if (obj[key] == null) return undefined;
  return requireNumber(obj, key, path, opts);
}

function optionalEnum<T>(obj: Obj, key: string, path: string, guard: (v: unknown) => v is T): T | undefined {
  const v = obj[key];
  if (v == null) return undefined;
  if (!guard(v)) throw new ValidationError(`${path}.${key} is invalid`);
  return v;
}

function parsePoint(value: unknown, path: string): Point {
  const o = requireObject(value, path);
  return {
    x: requireNumber(o, "x", path, { integer: true }),
    y: requireNumber(o, "y", path, { integer: true }),
  };
}

// ---- parsers ----

function parseStats(value: unknown, path: string): CombatStats {
  const o = requireObject(value, path);
  return {
    maxHp: requireNumber(o, "maxHp", path, { min: 1 }),
    attackPower: requireNumber(o, "attackPower", path, { min: 0 }),
    defensePower: requireNumber(o, "defensePower", path, { min: 0 }),
    speed: requireNumber(o, "speed", path),
    luck: requireNumber(o, "luck", path, { min: 0 }),
    finesse: requireNumber(o, "finesse", path, { min: 0 }),
    focus: requireNumber(o, "focus", path, { min: 0 }),
    movement: requireNumber(o, "movement", path, { min: 0, integer: true }),
  };
}

function parseBehavior(value: unknown, path: string): BehaviorConfig {
  const o = requireObject(value, path);
  const weight = (key: string) => optionalNumber(o, key, path, { min: 0 });

  switch (o.kind) {
    case "BERSERKER":
      return {
        kind: "BERSERKER",
        lowHpWeight: weight("lowHpWeight"),
        proximityWeight: weight("proximityWeight"),
        hazardAvoidance: weight("hazardAvoidance"),
        aggression: weight("aggression"),
        skillPreference: weight("skillPreference"),
      };
    case "SUPPORT":
      return {
        kind: "SUPPORT",
        supportPreference: weight("supportPreference"),
        healThreshold: weight("healThreshold"),
        hazardAvoidance: weight("hazardAvoidance"),
      };
    case "COWARD":
      return { kind: "COWARD", retreatThreshold: weight("retreatThreshold"), hazardAvoidance: weight("hazardAvoidance") };
    case "PROTECTOR":
      return { kind: "PROTECTOR", hazardAvoidance: weight("hazardAvoidance"), skillPreference: weight("skillPreference") };
    default:
      throw new ValidationError(`${path}.kind must be one of ${BEHAVIOR_KINDS.join(", ")}`);
  }
}

function parseProficiency(value: unknown, path: string): Partial<Record<WeaponFamily, ProficiencyTier | number>> {
  const o = requireObject(value, path);
  const out: Partial<Record<WeaponFamily, ProficiencyTier | number>> = {};
  for (const [family, tier] of Object.entries(o)) {
    if (!isWeaponFamily(family)) throw new ValidationError(`${path}: unknown weapon family ${family}`);
    if (typeof tier === "number" && Number.isInteger(tier)) out[family] = tier;
    else if (isProficiencyTier(tier)) out[family] = tier;
    else throw new ValidationError(`${path}.${family} must be a tier name or ordinal`);
  }
  return out;
}

function parseUnit(value: unknown, path: string): UnitSpec {
  const o = requireObject(value, path);
  const unitType = optionalEnum(o, "unit_type", path, isUnitType);
  const weapon = optionalEnum(o, "weapon_family", path, isWeaponFamily);

  const skills = o.skills == null
    ? undefined
    : requireArray(o.skills, `${path}.skills`).map((s, i) => {
        if (typeof s !== "string") throw new ValidationError(`${path}.skills[${i}] must be a skill id`);
        return s;
      });

  const effects = o.effects == null
    ? undefined
    : requireArray(o.effects, `${path}.effects`).map((e, i) => {
        const eo = requireObject(e, `${path}.effects[${i}]`);
        return {
          effectId: requireString(eo, "effectId", `${path}.effects[${i}]`),
          duration: requireNumber(eo, "duration", `${path}.effects[${i}]`, { min: 1, integer: true }),
        };
      });

  return {
    id: requireString(o, "id", path),
    name: optionalString(o, "name", path),
    faction_id: requireString(o, "faction_id", path),
    unit_type: unitType,
    position: parsePoint(o.position, `${path}.position`),
    stats: parseStats(o.stats, `${path}.stats`),
    hp: optionalNumber(o, "hp", path, { min: 0 }),
    weapon_family: weapon,
    proficiency: o.proficiency == null ? undefined : parseProficiency(o.proficiency, `${path}.proficiency`),
    behavior: o.behavior == null ? undefined : parseBehavior(o.behavior, `${path}.behavior`),
    skills,
    effects,
  };
}

function parseVictory(value: unknown, path: string): VictoryCondition {
  const o = requireObject(value, path);
  switch (o.type) {
    case "KILL_ALL":
      return { type: "KILL_ALL" };
    case "SURVIVE_ROUNDS":
      return { type: "SURVIVE_ROUNDS", rounds: requireNumber(o, "rounds", path, { min: 1, integer: true }) };
    case "PROTECT_TARGET":
      return { type: "PROTECT_TARGET", targetId: requireString(o, "targetId", path) };
    case "REACH_LOCATION":
      return { type: "REACH_LOCATION", location: parsePoint(o.location, `${path}.location`) };
    default:
      throw new ValidationError(`${path}.type is invalid`);
  }
}

function parseEncounter(value: unknown, path: string): EncounterConfig {
  const o = requireObject(value, path);
  return {
    victory: o.victory == null ? { type: "KILL_ALL" } : parseVictory(o.victory, `${path}.victory`),
    roundLimit: optionalNumber(o, "roundLimit", path, { min: 0, integer: true }),
  };
}

function parseFaction(value: unknown, path: string): FactionDefinition {
  const o = requireObject(value, path);
  const relationships: Partial<Record<FactionId, RelationshipType>> = {};
  if (o.relationships != null) {
    for (const [other, type] of Object.entries(requireObject(o.relationships, `${path}.relationships`))) {
      if (!isRelationship(type)) throw new ValidationError(`${path}.relationships.${other} is invalid`);
      relationships[other] = type;
    }
  }
  return {
    id: requireString(o, "id", path),
    name: optionalString(o, "name", path) ?? requireString(o, "id", path),
    playerControlled: o.playerControlled === true,
    relationships,
  };
}

function parseConstants(value: unknown, path: string): Partial<CombatConstants> {
  const o = requireObject(value, path);
  const out: Partial<CombatConstants> = {};
  for (const key of Object.keys(DEFAULT_COMBAT_CONSTANTS)) {
    if (!isConstantKey(key)) continue;
    const v = optionalNumber(o, key, path);
    if (v !== undefined) out[key] = v;
  }
  return out;
}

function isConstantKey(key: string): key is keyof CombatConstants {
  return key in DEFAULT_COMBAT_CONSTANTS;
}

export function parseCreateBattleRequest(body: unknown): CreateBattleRequest {
  const o = requireObject(body, "body");

  const units = requireArray(o.units, "units").map((u, i) => parseUnit(u, `units[${i}]`));
  if (units.length === 0) throw new ValidationError("units must not be empty");
  const seen = new Set<string>();
  for (const u of units) {
    if (seen.has(u.id)) throw new ValidationError(`duplicate unit id: ${u.id}`);
    seen.add(u.id);
  }

  const g = requireObject(o.grid, "grid");
  const grid = {
    width: requireNumber(g, "width", "grid", { min: 1, integer: true }),
    height: requireNumber(g, "height", "grid", { min: 1, integer: true }),
    blocked: g.blocked == null ? undefined : requireArray(g.blocked, "grid.blocked").map((p, i) => parsePoint(p, `grid.blocked[${i}]`)),
  };

  return {
    units,
    grid,
    factions: o.factions == null ? undefined : requireArray(o.factions, "factions").map((f, i) => parseFaction(f, `factions[${i}]`)),
    relationships: o.relationships == null
      ? undefined
      : requireArray(o.relationships, "relationships").map((r, i) => {
          const ro = requireObject(r, `relationships[${i}]`);
          const type = ro.type;
          if (!isRelationship(type)) throw new ValidationError(`relationships[${i}].type is invalid`);
          return { a: requireString(ro, "a", `relationships[${i}]`), b: requireString(ro, "b", `relationships[${i}]`), type };
        }),
    encounter: o.encounter == null ? undefined : parseEncounter(o.encounter, "encounter"),
    hazards: o.hazards == null
      ? undefined
      : requireArray(o.hazards, "hazards").map((h, i) => {
          const ho = requireObject(h, `hazards[${i}]`);
          return {
            at: parsePoint(ho.at, `hazards[${i}].at`),
            damage: requireNumber(ho, "damage", `hazards[${i}]`, { min: 1 }),
            rounds: requireNumber(ho, "rounds", `hazards[${i}]`, { min: 1, integer: true }),
          };
        }),
    seed: optionalNumber(o, "seed", "body", { integer: true }),
    player_faction_id: optionalString(o, "player_faction_id", "body"),
    constants: o.constants == null ? undefined : parseConstants(o.constants, "constants"),
  };
}

export function parseActionRequest(body: unknown): BattleActionRequest {
  const o = requireObject(body, "body");
  const actor_id = requireString(o, "actor_id", "body");

  switch (o.type) {
    case "ATTACK":
      return { type: "ATTACK", actor_id, target_id: requireString(o, "target_id", "body") };
    case "SKILL":
      return {
        type: "SKILL",
        actor_id,
        skill_id: requireString(o, "skill_id", "body"),
        target_id: requireString(o, "target_id", "body"),
      };
    case "MOVE":
      return { type: "MOVE", actor_id, destination: parsePoint(o.destination, "body.destination") };
    case "END_TURN":
      return { type: "END_TURN", actor_id };
    default:
      throw new ValidationError("body.type must be one of ATTACK, SKILL, MOVE, END_TURN");
  }
}
