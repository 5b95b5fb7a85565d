import type { Logger } from "pino";
import type { FactionId, RelationshipType } from "./types";

export interface FactionDefinition {
  id: FactionId;
  name: string;
  playerControlled: boolean;
  /** relationships this faction declares toward others; the resolver mirrors them */
  relationships?: Partial<Record<FactionId, RelationshipType>>;
}

function pairKey(a: FactionId, b: FactionId): string {
  return `${a}\u0000${b}`;
}

/**
 * Symmetric faction matrix. Same faction is always ALLY, an unknown pair is HOSTILE.
 * Owned by one battle; mutable while it runs.
 */
export class FactionRelationshipResolver {
  private readonly matrix = new Map<string, RelationshipType>();

  constructor(private readonly log?: Logger) {}

  getRelationship(a: FactionId, b: FactionId): RelationshipType {
    if (a === b) return "ALLY";
    return this.matrix.get(pairKey(a, b)) ?? "HOSTILE";
  }

  setRelationship(a: FactionId, b: FactionId, type: RelationshipType): void {
    if (a === b) {
      this.log?.warn({ faction: a }, "a faction is always allied with itself; ignoring");
      return;
    }
    this.matrix.set(pairKey(a, b), type);
    this.matrix.set(pairKey(b, a), type);
  }

  isHostile(a: FactionId, b: FactionId): boolean {
    return this.getRelationship(a, b) === "HOSTILE";
  }

  isAlly(a: FactionId, b: FactionId): boolean {
    return this.getRelationship(a, b) === "ALLY";
  }

  getHostileFactions(of: FactionId, among: Iterable<FactionId>): FactionId[] {
    const out: FactionId[] = [];
    for (const f of new Set(among)) {
      if (this.isHostile(of, f)) out.push(f);
    }
    return out;
  }
}

export class FactionRegistry {
  private readonly factions = new Map<FactionId, FactionDefinition>();

  constructor(definitions: FactionDefinition[] = []) {
    for (const d of definitions) this.register(d);
  }

  register(definition: FactionDefinition): void {
    this.factions.set(definition.id, definition);
  }

  get(id: FactionId): FactionDefinition | null {
    return this.factions.get(id) ?? null;
  }

  all(): FactionDefinition[] {
    return [...this.factions.values()];
  }

  isPlayerControlled(id: FactionId): boolean {
    return this.factions.get(id)?.playerControlled ?? false;
  }

  createResolver(log?: Logger): FactionRelationshipResolver {
    const resolver = new FactionRelationshipResolver(log);
    for (const d of this.factions.values()) {
      for (const [other, type] of Object.entries(d.relationships ?? {})) {
        if (type) resolver.setRelationship(d.id, other, type);
      }
    }
    return resolver;
  }
}
