import skillLibrary from "../data/skills.json";
import { isUnitType } from "./validate";
import type { AreaPattern, SkillArea, SkillDefinition, SkillKind, UnitType } from "./types";

const AREA_PATTERNS: readonly AreaPattern[] = ["LINE_LIMITED", "LINE_PASSTHROUGH", "CLOUD", "FAN"];

function toSkillKind(value: string): SkillKind {
  return value === "SUPPORT" ? "SUPPORT" : "ATTACK";
}

function toSkillArea(skillId: string, raw: { pattern: string; size: number; origin: string } | undefined): SkillArea | undefined {
  if (!raw) return undefined;
  const pattern = AREA_PATTERNS.find((p) => p === raw.pattern);
  if (!pattern) throw new Error(`skill ${skillId}: unknown area pattern ${raw.pattern}`);
  return { pattern, size: raw.size, origin: raw.origin === "TARGET" ? "TARGET" : "SOURCE" };
}

const LIBRARY = new Map<string, SkillDefinition>(
  skillLibrary.map((s): [string, SkillDefinition] => {
    const suitableFor: UnitType[] = (s.suitableFor ?? []).filter(isUnitType);
    return [s.id, { ...s, kind: toSkillKind(s.kind), suitableFor, area: toSkillArea(s.id, s.area) }];
  })
);

export function getSkillDefinition(id: string): SkillDefinition | null {
  return LIBRARY.get(id) ?? null;
}
