// src/engine/costModel.ts

import { GeoLocation, Patient, PatientAcuity } from '../models/Patient';
import { Facility } from '../models/Facility';
import { TransportMode } from '../models/Incident';
import { OptimizationRules } from '../config/optimizationRules';
import { calculateEtaMinutes } from './distanceCalculator';

/**
 * Cost model - pure scoring of a (patient, facility) pairing
 *
 * Shared by the pooled assignment optimizer and the evacuation chain builder.
 * Lower cost = better pairing.
 *
 * Facility maps are read as full vectors over the catalogs:
 * - no requirement map / no facility map → nothing to compare
 * - key absent from a present facility map → `false` / 0, penalised when required
 */

export interface CapabilityCheck {
    isMatch: boolean;
    missing: string[];
    penalty: number;
}

export interface ResourceCheck {
    hasDeficit: boolean;
    deficits: Record<string, number>;
    deficitPenalty: number;  // Applied once per pairing
    stress: number;
}

export interface CostBreakdown {
    etaMinutes: number;
    acuityWeight: number;
    timeCost: number;
    capabilityPenalty: number;
    missingCapabilities: string[];
    resourceStress: number;
    deficitPenalty: number;
    deficits: Record<string, number>;
    stewardshipPenalty: number;
    affinityScore: number;
    total: number;
}

export interface PairingOptions {
    mode: TransportMode;
    includeStewardship: boolean;  // Pooled optimizer only
}

export function isDeceased(patient: Patient): boolean {
    return patient.acuity === PatientAcuity.DEAD || patient.deceased === true;
}

/**
 * Priority multiplier for an acuity level
 * Unknown or undefined acuity maps to the low default weight
 */
export function getAcuityWeight(acuity: string, rules: OptimizationRules): number {
    return rules.acuityWeights[acuity] ?? rules.defaultAcuityWeight;
}

/**
 * Minutes left before predicted death
 *
 * @param patient Patient record
 * @param now Decision time
 * @returns Slack in minutes (negative once expired); default window when no prediction
 */
export function survivalSlackMinutes(patient: Patient, now: Date, rules: OptimizationRules): number {
    if (!patient.predictedDeathAt) {
        return rules.defaultSurvivalWindowMinutes;
    }

    const predictedDeath = Date.parse(patient.predictedDeathAt);
    if (Number.isNaN(predictedDeath)) {
        return rules.defaultSurvivalWindowMinutes;
    }

    return (predictedDeath - now.getTime()) / 60000;
}

/**
 * Required capabilities the facility lacks
 * Capabilities left out of a present facility map count as absent
 */
export function evaluateCapabilities(
    patient: Patient,
    facility: Facility,
    rules: OptimizationRules
): CapabilityCheck {
    const required = patient.requiredCapabilities;
    const available = facility.capabilities;
    if (!required || !available) {
        return { isMatch: true, missing: [], penalty: 0 };
    }

    const missing = rules.capabilityCatalog.filter(
        capability => required[capability] === true && available[capability] !== true
    );

    return {
        isMatch: missing.length === 0,
        missing,
        penalty: missing.length * rules.capabilityMismatchPenalty
    };
}

/**
 * Congestion signal for one resource type
 * (required / available)^exponent × multiplier; no capacity at all counts as a deficit
 */
export function calculateResourceStress(
    requiredQty: number,
    availableQty: number,
    rules: OptimizationRules
): number {
    if (availableQty <= 0) {
        return rules.resourceDeficitPenalty;
    }
    const utilization = requiredQty / availableQty;
    return utilization ** rules.resourceStressExponent * rules.resourceStressMultiplier;
}

/**
 * Shortfalls and stress against reported capacity
 * A resource the facility's map leaves out has zero capacity
 */
export function evaluateResources(
    patient: Patient,
    facility: Facility,
    rules: OptimizationRules
): ResourceCheck {
    const required = patient.requiredResources;
    const available = facility.resources;
    const deficits: Record<string, number> = {};
    let stress = 0;

    if (required && available) {
        for (const resource of rules.resourceCatalog) {
            const requiredQty = required[resource] ?? 0;
            const availableQty = available[resource] ?? 0;
            if (requiredQty <= 0) {
                continue;
            }

            if (availableQty < requiredQty) {
                deficits[resource] = requiredQty - Math.max(availableQty, 0);
            }
            if (availableQty > 0) {
                stress += calculateResourceStress(requiredQty, availableQty, rules);
            }
        }
    }

    const hasDeficit = Object.keys(deficits).length > 0;
    return {
        hasDeficit,
        deficits,
        deficitPenalty: hasDeficit ? rules.resourceDeficitPenalty : 0,
        stress
    };
}

/**
 * Scarcity cost of sending a patient to specialised capability they don't need
 * Keeps burn / pediatric / obstetric capacity for patients who do
 */
export function calculateStewardshipPenalty(
    patient: Patient,
    facility: Facility,
    rules: OptimizationRules
): number {
    const available = facility.capabilities;
    if (!available) {
        return 0;
    }
    const required = patient.requiredCapabilities ?? {};

    let penalty = 0;
    for (const capability of rules.capabilityCatalog) {
        if (available[capability] === true && required[capability] !== true) {
            penalty += rules.scarcityPenalties[capability] ?? 0;
        }
    }
    return penalty;
}

/**
 * Affinity bonus between acuity and echelon level (subtracted from cost)
 */
export function getAcuityLevelScore(acuity: string, level: number, rules: OptimizationRules): number {
    return rules.acuityLevelScores[acuity]?.[level] ?? 0;
}

/**
 * Full cost of one pairing
 *
 * @param origin Where the patient currently is (scene or previous leg)
 * @returns Breakdown with total = Infinity when the facility is unreachable
 */
export function scorePairing(
    patient: Patient,
    facility: Facility,
    origin: GeoLocation | null | undefined,
    rules: OptimizationRules,
    options: PairingOptions
): CostBreakdown {
    const etaMinutes = calculateEtaMinutes(origin, facility.location, options.mode, rules);
    const acuityWeight = getAcuityWeight(patient.acuity, rules);
    const capabilities = evaluateCapabilities(patient, facility, rules);
    const resources = evaluateResources(patient, facility, rules);
    const stewardshipPenalty = options.includeStewardship
        ? calculateStewardshipPenalty(patient, facility, rules)
        : 0;
    const affinityScore = getAcuityLevelScore(patient.acuity, facility.level, rules);

    const reachable = Number.isFinite(etaMinutes);
    const timeCost = reachable ? etaMinutes * acuityWeight : Infinity;
    const total = reachable
        ? timeCost +
          capabilities.penalty +
          resources.stress +
          resources.deficitPenalty +
          stewardshipPenalty -
          affinityScore
        : Infinity;

    return {
        etaMinutes,
        acuityWeight,
        timeCost,
        capabilityPenalty: capabilities.penalty,
        missingCapabilities: capabilities.missing,
        resourceStress: resources.stress,
        deficitPenalty: resources.deficitPenalty,
        deficits: resources.deficits,
        stewardshipPenalty,
        affinityScore,
        total
    };
}
