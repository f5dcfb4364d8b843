// src/engine/evacuationChainBuilder.ts

import { GeoLocation, Patient } from '../models/Patient';
import { Facility } from '../models/Facility';
import { TransportMode } from '../models/Incident';
import { ChainLeg, ReasoningCode, TimelineCompliance } from '../models/Decision';
import { EvacuationStage, OptimizationRules } from '../config/optimizationRules';
import { toCoordinates } from './distanceCalculator';
import { scorePairing } from './costModel';

export interface StageSelection {
    facility: Facility;
    etaMinutes: number;
    cost: number;
}

/**
 * Chain outcome before it is packaged into a decision
 */
export type ChainOutcome =
    | { kind: 'forfeit'; reasoningCode: ReasoningCode; chain: ChainLeg[]; totalTimeMinutes: number }
    | {
          kind: 'transfer';
          reasoningCode: ReasoningCode.EVACUATION_CHAIN_OPTIMAL;
          chain: ChainLeg[];
          totalTimeMinutes: number;
          compliance: TimelineCompliance;
      };

/**
 * MEDEVAC evacuation chain builder (NATO AJP-4.10 echelons)
 *
 * Stages run in order (Role 1 at level 3 → Role 2 at level 2 → Role 3 at level 1)
 * with a monotonically increasing elapsed-time accumulator.
 *
 * Greedy and non-backtracking: a stage's choice is never revisited, even if it
 * leaves no feasible continuation. A stage without facilities of its level is
 * skipped, not failed.
 */
export class EvacuationChainBuilder {
    private facilities: Facility[];
    private rules: OptimizationRules;
    private mode: TransportMode;

    constructor(facilities: Facility[], rules: OptimizationRules, mode: TransportMode = TransportMode.GROUND) {
        this.facilities = facilities;
        this.rules = rules;
        this.mode = mode;
    }

    /**
     * Build the chain for one patient
     *
     * @param patient Patient (survival already checked by the caller)
     * @param slackMinutes Survival window in minutes
     */
    build(patient: Patient, slackMinutes: number): ChainOutcome {
        if (!toCoordinates(patient.location)) {
            return { kind: 'forfeit', reasoningCode: ReasoningCode.NO_LOCATION, chain: [], totalTimeMinutes: 0 };
        }

        const chain: ChainLeg[] = [];
        let position: GeoLocation | null | undefined = patient.location;
        let elapsed = 0;

        for (const stage of this.rules.evacuationStages) {
            const candidates = this.facilities.filter(f => f.level === stage.level);
            if (candidates.length === 0) {
                continue;
            }

            const deadline = this.stageDeadline(stage, slackMinutes);
            const selection = this.findBestFacility(patient, candidates, position, deadline - elapsed);
            if (!selection) {
                continue;
            }

            elapsed += selection.etaMinutes;
            chain.push({
                role: stage.role,
                level: stage.level,
                facilityId: selection.facility.id,
                facilityName: selection.facility.name,
                etaMinutes: selection.etaMinutes,
                cumulativeMinutes: elapsed,
                timelineCompliance: elapsed <= deadline
            });

            if (toCoordinates(selection.facility.location)) {
                position = selection.facility.location;
            }
        }

        if (chain.length === 0) {
            return { kind: 'forfeit', reasoningCode: ReasoningCode.NO_VIABLE_CHAIN, chain, totalTimeMinutes: 0 };
        }

        if (elapsed > slackMinutes) {
            return { kind: 'forfeit', reasoningCode: ReasoningCode.DEAD_ON_ARRIVAL, chain, totalTimeMinutes: elapsed };
        }

        return {
            kind: 'transfer',
            reasoningCode: ReasoningCode.EVACUATION_CHAIN_OPTIMAL,
            chain,
            totalTimeMinutes: elapsed,
            compliance: {
                role1Compliant: chain.some(leg => leg.role === 'Role 1' && leg.timelineCompliance),
                role2Compliant: chain.some(leg => leg.role === 'Role 2' && leg.timelineCompliance),
                survivalCompliant: elapsed <= slackMinutes
            }
        };
    }

    /**
     * Cheapest facility whose ETA fits the remaining budget
     *
     * Facilities over budget are excluded, not penalised. Cost is the shared
     * pairing cost without the stewardship term. Ties keep the first facility.
     *
     * @returns Selection or null if nothing fits
     */
    findBestFacility(
        patient: Patient,
        candidates: Facility[],
        from: GeoLocation | null | undefined,
        budgetMinutes: number
    ): StageSelection | null {
        let best: StageSelection | null = null;

        for (const facility of candidates) {
            const breakdown = scorePairing(patient, facility, from, this.rules, {
                mode: this.mode,
                includeStewardship: false
            });

            if (!Number.isFinite(breakdown.etaMinutes) || breakdown.etaMinutes > budgetMinutes) {
                continue;
            }

            if (!best || breakdown.total < best.cost) {
                best = { facility, etaMinutes: breakdown.etaMinutes, cost: breakdown.total };
            }
        }

        return best;
    }

    private stageDeadline(stage: EvacuationStage, slackMinutes: number): number {
        return stage.deadlineMinutes ?? slackMinutes;
    }
}
