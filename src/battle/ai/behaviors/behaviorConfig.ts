export type BehaviorKind = "BERSERKER" | "SUPPORT" | "COWARD" | "PROTECTOR";

export interface BerserkerTuning {
  lowHpWeight: number;
  proximityWeight: number;
  hazardAvoidance: number;
  aggression: number;
  skillPreference: number;
}

export interface SupportTuning {
  supportPreference: number;
  /** allies under this HP fraction are healing candidates */
  healThreshold: number;
  hazardAvoidance: number;
}

export interface CowardTuning {
  retreatThreshold: number;
  hazardAvoidance: number;
}

export interface ProtectorTuning {
  hazardAvoidance: number;
  skillPreference: number;
}

export type BehaviorConfig =
  | ({ kind: "BERSERKER" } & Partial<BerserkerTuning>)
  | ({ kind: "SUPPORT" } & Partial<SupportTuning>)
  | ({ kind: "COWARD" } & Partial<CowardTuning>)
  | ({ kind: "PROTECTOR" } & Partial<ProtectorTuning>);

export const BERSERKER_DEFAULTS: BerserkerTuning = {
  lowHpWeight: 0.5,
  proximityWeight: 0.3,
  hazardAvoidance: 0.5,
  aggression: 0.7,
  skillPreference: 0.3,
};

export const SUPPORT_DEFAULTS: SupportTuning = {
  supportPreference: 0.5,
  healThreshold: 0.8,
  hazardAvoidance: 0.8,
};

export const COWARD_DEFAULTS: CowardTuning = {
  retreatThreshold: 0.3,
  hazardAvoidance: 0.9,
};

export const PROTECTOR_DEFAULTS: ProtectorTuning = {
  hazardAvoidance: 0.6,
  skillPreference: 0.3,
};

export const BEHAVIOR_KINDS: readonly BehaviorKind[] = ["BERSERKER", "SUPPORT", "COWARD", "PROTECTOR"];
