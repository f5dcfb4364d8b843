// src/config/optimizationRules.ts

import { EvacuationRole } from '../models/Decision';
import { FacilityLevel } from '../models/Facility';
import { TransportMode } from '../models/Incident';

/**
 * One echelon checkpoint of a MEDEVAC chain
 * deadlineMinutes is cumulative from point of injury; null means "survival window"
 */
export interface EvacuationStage {
    role: EvacuationRole;
    level: FacilityLevel;
    deadlineMinutes: number | null;
}

/**
 * Tunable tables and constants shared by the cost model, the assignment
 * optimizer and the chain builder
 *
 * Injected everywhere instead of read from module scope, so deployments can
 * retune without code changes and tests can use simplified tables.
 *
 * Total pairing cost:
 *   eta × acuityWeight + capabilityPenalty + resourceStress
 *   + (resourceDeficitPenalty if any deficit) + stewardship − affinity
 */
export interface OptimizationRules {
    acuityWeights: Record<string, number>;
    defaultAcuityWeight: number;                    // Unknown acuity, never an error
    scarcityPenalties: Record<string, number>;      // Stewardship, pooled optimizer only
    acuityLevelScores: Record<string, Record<number, number>>;  // acuity → level → bonus
    capabilityCatalog: string[];
    resourceCatalog: string[];
    capabilityMismatchPenalty: number;              // Per missing required capability
    resourceDeficitPenalty: number;                 // Once per pairing, not per unit
    resourceStressMultiplier: number;
    resourceStressExponent: number;
    transportSpeedsKmh: Record<TransportMode, number>;
    evacuationStages: EvacuationStage[];
    maxAlternatives: number;
    defaultSurvivalWindowMinutes: number;           // No death prediction
    solverTimeLimitSeconds: number;
}

export interface RulesOverrides {
    acuityWeights?: Record<string, number>;
    defaultAcuityWeight?: number;
    scarcityPenalties?: Record<string, number>;
    acuityLevelScores?: Record<string, Record<number, number>>;
    capabilityCatalog?: string[];
    resourceCatalog?: string[];
    capabilityMismatchPenalty?: number;
    resourceDeficitPenalty?: number;
    resourceStressMultiplier?: number;
    resourceStressExponent?: number;
    transportSpeedsKmh?: Partial<Record<TransportMode, number>>;
    evacuationStages?: EvacuationStage[];
    maxAlternatives?: number;
    defaultSurvivalWindowMinutes?: number;
    solverTimeLimitSeconds?: number;
}

export const DEFAULT_OPTIMIZATION_RULES: OptimizationRules = {
    acuityWeights: {
        Dead: 0,
        Expectant: 80,
        Immediate: 100,
        Delayed: 50,
        Minimal: 10,
        Undefined: 10
    },
    defaultAcuityWeight: 10,
    scarcityPenalties: {
        burn: 500,
        pediatric: 500,
        obstetric: 500,
        neurosurgical: 400,
        cardiac: 300,
        hepatobiliary: 300,
        thoracic: 200,
        vascular: 200,
        ophthalmology: 100,
        ent: 100,
        trauma_center: 0,
        orthopedic: 0
    },
    // Positive = good match (reduces cost), negative = poor match
    acuityLevelScores: {
        Immediate: { 1: 200, 2: 100, 3: 0 },
        Expectant: { 1: 100, 2: 50, 3: 0 },
        Delayed: { 1: 50, 2: 100, 3: 50 },
        Minimal: { 1: -100, 2: 0, 3: 100 }
    },
    capabilityCatalog: [
        'trauma_center',
        'neurosurgical',
        'orthopedic',
        'ophthalmology',
        'burn',
        'pediatric',
        'obstetric',
        'cardiac',
        'thoracic',
        'vascular',
        'ent',
        'hepatobiliary'
    ],
    resourceCatalog: [
        'ward',
        'ordinary_icu',
        'operating_room',
        'ventilator',
        'prbc_unit',
        'isolation',
        'decontamination_unit',
        'ct_scanner',
        'oxygen_cylinder',
        'interventional_radiology'
    ],
    capabilityMismatchPenalty: 10000,
    resourceDeficitPenalty: 5000,
    resourceStressMultiplier: 100,
    resourceStressExponent: 2,
    transportSpeedsKmh: {
        [TransportMode.GROUND]: 50,
        [TransportMode.AIR]: 200
    },
    // 10-1-2 timeline: golden hour to Role 1, damage control by 2h at Role 2
    evacuationStages: [
        { role: 'Role 1', level: FacilityLevel.INITIAL_STABILIZATION, deadlineMinutes: 60 },
        { role: 'Role 2', level: FacilityLevel.ADVANCED_TRAUMA, deadlineMinutes: 120 },
        { role: 'Role 3', level: FacilityLevel.DEFINITIVE_CARE, deadlineMinutes: null }
    ],
    maxAlternatives: 3,
    defaultSurvivalWindowMinutes: 24 * 60,
    solverTimeLimitSeconds: 10
};

/**
 * Merge overrides onto the defaults
 *
 * Lookup tables are merged key by key; catalogs, stages and scalars replace.
 *
 * @param overrides Partial rules (e.g. parsed from RULES_PATH)
 * @param base Rules to merge onto
 * @returns Complete rules object
 */
export function resolveRules(
    overrides: RulesOverrides = {},
    base: OptimizationRules = DEFAULT_OPTIMIZATION_RULES
): OptimizationRules {
    const speeds: Partial<Record<TransportMode, number>> = overrides.transportSpeedsKmh ?? {};

    return {
        acuityWeights: { ...base.acuityWeights, ...overrides.acuityWeights },
        defaultAcuityWeight: overrides.defaultAcuityWeight ?? base.defaultAcuityWeight,
        scarcityPenalties: { ...base.scarcityPenalties, ...overrides.scarcityPenalties },
        acuityLevelScores: { ...base.acuityLevelScores, ...overrides.acuityLevelScores },
        capabilityCatalog: overrides.capabilityCatalog ?? base.capabilityCatalog,
        resourceCatalog: overrides.resourceCatalog ?? base.resourceCatalog,
        capabilityMismatchPenalty: overrides.capabilityMismatchPenalty ?? base.capabilityMismatchPenalty,
        resourceDeficitPenalty: overrides.resourceDeficitPenalty ?? base.resourceDeficitPenalty,
        resourceStressMultiplier: overrides.resourceStressMultiplier ?? base.resourceStressMultiplier,
        resourceStressExponent: overrides.resourceStressExponent ?? base.resourceStressExponent,
        transportSpeedsKmh: {
            [TransportMode.GROUND]: speeds[TransportMode.GROUND] ?? base.transportSpeedsKmh[TransportMode.GROUND],
            [TransportMode.AIR]: speeds[TransportMode.AIR] ?? base.transportSpeedsKmh[TransportMode.AIR]
        },
        evacuationStages: overrides.evacuationStages ?? base.evacuationStages,
        maxAlternatives: overrides.maxAlternatives ?? base.maxAlternatives,
        defaultSurvivalWindowMinutes: overrides.defaultSurvivalWindowMinutes ?? base.defaultSurvivalWindowMinutes,
        solverTimeLimitSeconds: overrides.solverTimeLimitSeconds ?? base.solverTimeLimitSeconds
    };
}
