// src/test/evacuationChainBuilder.test.ts

import { describe, it, expect } from 'vitest';
import { FacilityLevel } from '../models/Facility';
import { ReasoningCode } from '../models/Decision';
import { EvacuationChainBuilder } from '../engine/evacuationChainBuilder';
import { east, makeFacility, makePatient, testRules } from './support/fixtures';

const rules = testRules();

const role1 = (id: string, minutes: number) =>
    makeFacility(id, { level: FacilityLevel.INITIAL_STABILIZATION, location: east(minutes) });
const role2 = (id: string, minutes: number) =>
    makeFacility(id, { level: FacilityLevel.ADVANCED_TRAUMA, location: east(minutes) });
const role3 = (id: string, minutes: number) =>
    makeFacility(id, { level: FacilityLevel.DEFINITIVE_CARE, location: east(minutes) });

describe('EvacuationChainBuilder', () => {
    it('chains Role 1 → Role 2 → Role 3 with cumulative times', () => {
        const builder = new EvacuationChainBuilder([role3('R3', 90), role1('R1', 20), role2('R2', 50)], rules);
        const outcome = builder.build(makePatient('P1'), 240);

        expect(outcome.kind).toBe('transfer');
        expect(outcome.chain.map(leg => [leg.role, leg.level, leg.facilityId])).toEqual([
            ['Role 1', 3, 'R1'],
            ['Role 2', 2, 'R2'],
            ['Role 3', 1, 'R3']
        ]);
        expect(outcome.chain[0].etaMinutes).toBeCloseTo(20, 6);
        expect(outcome.chain[1].etaMinutes).toBeCloseTo(30, 6);
        expect(outcome.chain[2].etaMinutes).toBeCloseTo(40, 6);
        expect(outcome.chain[2].cumulativeMinutes).toBeCloseTo(90, 6);
        expect(outcome.chain.every(leg => leg.timelineCompliance)).toBe(true);
        expect(outcome.totalTimeMinutes).toBeCloseTo(90, 6);
        if (outcome.kind === 'transfer') {
            expect(outcome.reasoningCode).toBe(ReasoningCode.EVACUATION_CHAIN_OPTIMAL);
            expect(outcome.compliance).toEqual({ role1Compliant: true, role2Compliant: true, survivalCompliant: true });
        }
    });

    it('excludes a cheaper facility whose ETA breaks the stage deadline', () => {
        const patient = makePatient('P1', { requiredCapabilities: { trauma_center: true } });
        const lacking = makeFacility('near', {
            level: FacilityLevel.INITIAL_STABILIZATION,
            location: east(30),
            capabilities: { trauma_center: false }
        });
        const capable = makeFacility('far', {
            level: FacilityLevel.INITIAL_STABILIZATION,
            location: east(-65),
            capabilities: { trauma_center: true }
        });
        const builder = new EvacuationChainBuilder([lacking, capable], rules);

        // far: 65 × 100 = 6500 beats near: 30 × 100 + 10000, but 65 > 60
        expect(builder.findBestFacility(patient, [lacking, capable], patient.location, 1000)?.facility.id).toBe('far');
        expect(builder.findBestFacility(patient, [lacking, capable], patient.location, 60)?.facility.id).toBe('near');

        const outcome = builder.build(patient, 240);
        expect(outcome.chain).toHaveLength(1);
        expect(outcome.chain[0].facilityId).toBe('near');
        expect(outcome.chain[0].timelineCompliance).toBe(true);
    });

    it('skips echelons that have no facilities', () => {
        const builder = new EvacuationChainBuilder([role1('R1', 20), role3('R3', 60)], rules);
        const outcome = builder.build(makePatient('P1'), 240);

        expect(outcome.kind).toBe('transfer');
        expect(outcome.chain.map(leg => leg.role)).toEqual(['Role 1', 'Role 3']);
        if (outcome.kind === 'transfer') {
            expect(outcome.compliance).toEqual({ role1Compliant: true, role2Compliant: false, survivalCompliant: true });
        }
    });

    it('forfeits with NO_VIABLE_CHAIN when nothing fits any stage', () => {
        const builder = new EvacuationChainBuilder([role1('R1', 70)], rules);
        const outcome = builder.build(makePatient('P1'), 50);

        expect(outcome).toEqual({
            kind: 'forfeit',
            reasoningCode: ReasoningCode.NO_VIABLE_CHAIN,
            chain: [],
            totalTimeMinutes: 0
        });
    });

    it('returns the non-viable chain when the patient would die en route', () => {
        const builder = new EvacuationChainBuilder([role1('R1', 45), role2('R2', 115)], rules);
        const outcome = builder.build(makePatient('P1'), 100);

        expect(outcome.kind).toBe('forfeit');
        expect(outcome.reasoningCode).toBe(ReasoningCode.DEAD_ON_ARRIVAL);
        expect(outcome.chain.map(leg => leg.facilityId)).toEqual(['R1', 'R2']);
        expect(outcome.chain[1].cumulativeMinutes).toBeCloseTo(115, 6);
        expect(outcome.chain[1].timelineCompliance).toBe(true);
        expect(outcome.totalTimeMinutes).toBeCloseTo(115, 6);
    });

    it('forfeits with NO_LOCATION for an unlocated patient', () => {
        const builder = new EvacuationChainBuilder([role1('R1', 20)], rules);
        const outcome = builder.build(makePatient('P1', { location: { latitude: 1 } }), 240);

        expect(outcome.kind).toBe('forfeit');
        expect(outcome.reasoningCode).toBe(ReasoningCode.NO_LOCATION);
        expect(outcome.chain).toEqual([]);
    });

    it('keeps the first facility on a cost tie', () => {
        const builder = new EvacuationChainBuilder([], rules);
        const a = role1('A', 10);
        const b = role1('B', -10);

        expect(builder.findBestFacility(makePatient('P1'), [a, b], east(0), 60)?.facility.id).toBe('A');
    });
});
