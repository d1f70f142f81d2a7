import { DEFAULT_DRIFT_DAMPING } from "../constants";
import { ConfigurationError } from "./errors";
import type { AttackKind, DefenseKind, ResourcePool } from "./outcomes";
import { resolveTargeterConfig, type TargeterConfig } from "./targeting";

export interface EffectColor {
  red: number;
  green: number;
  blue: number;
}

/** Traveling visual that carries the ability from the caster to the point. */
export interface ProjectileStage {
  template: string;
  /** World units per second. */
  speed: number;
  particleSize: number;
  color: EffectColor;
  driftDamping?: number;
}

/** Area burst played at the selected point once the projectile lands. */
export interface DetonationStage {
  template: string;
  durationMs: number;
  size: number;
  /** Offset into the burst at which each target's attack resolves. */
  attackOffsetMs: number;
}

export interface AttackSpec {
  defense: DefenseKind;
  attack: AttackKind;
  baseAmount: number;
  resource: ResourcePool;
}

export interface AbilityDefinition {
  id: string;
  name: string;
  targeting: TargeterConfig;
  projectile: ProjectileStage;
  detonation: DetonationStage;
  attack: AttackSpec;
}

export const ABILITY_DEFINITIONS = {
  stun_grenade: {
    id: "stun_grenade",
    name: "Stun Grenade",
    targeting: {
      maxRange: 12,
      passableFootprint: "1by1",
      shape: { type: "object_size", size: "7by7round" },
    },
    projectile: {
      template: "particles/circle12",
      speed: 20,
      particleSize: 0.7,
      color: { red: 0.5, green: 0.5, blue: 0.5 },
      driftDamping: DEFAULT_DRIFT_DAMPING,
    },
    detonation: {
      template: "burst",
      durationMs: 150,
      size: 8,
      attackOffsetMs: 100,
    },
    attack: {
      defense: "reflex",
      attack: "ranged",
      baseAmount: -2000,
      resource: "overflowAp",
    },
  },
} satisfies Record<string, AbilityDefinition>;

export type AbilityId = keyof typeof ABILITY_DEFINITIONS;
export const ABILITY_LIST: AbilityDefinition[] = Object.values(ABILITY_DEFINITIONS);

const requirePositive = (value: number, label: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${label} must be positive, got ${value}`);
  }
};

/** Reject definitions that could never schedule a valid pipeline. */
export const validateAbilityDefinition = (ability: AbilityDefinition): void => {
  if (ability.id.length === 0) {
    throw new ConfigurationError("Ability id must not be empty");
  }

  resolveTargeterConfig(ability.targeting);

  const { projectile, detonation, attack } = ability;
  requirePositive(projectile.speed, `${ability.id} projectile speed`);
  requirePositive(projectile.particleSize, `${ability.id} projectile particle size`);
  if (projectile.driftDamping !== undefined) {
    requirePositive(projectile.driftDamping, `${ability.id} drift damping`);
  }

  requirePositive(detonation.durationMs, `${ability.id} detonation duration`);
  requirePositive(detonation.size, `${ability.id} detonation size`);
  if (
    !Number.isFinite(detonation.attackOffsetMs) ||
    detonation.attackOffsetMs < 0 ||
    detonation.attackOffsetMs > detonation.durationMs
  ) {
    throw new ConfigurationError(
      `${ability.id} attack offset ${detonation.attackOffsetMs}ms falls outside the ${detonation.durationMs}ms detonation`,
    );
  }

  if (!Number.isInteger(attack.baseAmount)) {
    throw new ConfigurationError(
      `${ability.id} base amount must be an integer, got ${attack.baseAmount}`,
    );
  }
};

export const isAbilityId = (id: string): id is AbilityId =>
  Object.prototype.hasOwnProperty.call(ABILITY_DEFINITIONS, id);
