// src/test/routes.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Server } from 'http';
import { Facility } from '../models/Facility';
import { TransferRecord } from '../models/TransferRecord';
import { TransferDecisionEngine } from '../engine/transferDecisionEngine';
import { toRoster } from '../engine/facilityRoster';
import { TemplateReasoningGenerator } from '../reasoning/reasoningGenerator';
import { createApp } from '../app';
import { ExhaustiveBackend } from './support/exhaustiveBackend';
import { east, makeFacility, testRules } from './support/fixtures';

interface JsonResult {
    status: number;
    body: unknown;
}

describe('HTTP routes', () => {
    let server: Server;
    let baseUrl: string;
    let roster: Map<string, Facility>;
    let records: Map<string, TransferRecord>;

    async function call(method: 'GET' | 'POST', path: string, body?: unknown): Promise<JsonResult> {
        const response = await fetch(`${baseUrl}${path}`, {
            method,
            headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body)
        });
        return { status: response.status, body: await response.json() };
    }

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        roster = toRoster([
            makeFacility('F1', { location: east(10), resources: { ordinary_icu: 2 } }),
            makeFacility('F2', { location: east(30), resources: { ordinary_icu: 4 } })
        ]);
        records = new Map();
        const engine = new TransferDecisionEngine(roster, {
            rules: testRules(),
            backend: new ExhaustiveBackend(),
            reasoningGenerator: new TemplateReasoningGenerator()
        });
        const app = createApp({ roster, records, engine });

        server = await new Promise<Server>(resolve => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (!address || typeof address === 'string') {
            throw new Error('Server did not bind to a TCP port');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
        vi.restoreAllMocks();
    });

    it('reports health with store sizes', async () => {
        expect(await call('GET', '/health')).toEqual({
            status: 200,
            body: { status: 'healthy', facilities: 2, transfers: 0 }
        });
    });

    describe('/facilities', () => {
        it('lists and fetches facilities', async () => {
            const list = await call('GET', '/facilities');
            expect(list.status).toBe(200);
            expect(list.body).toHaveLength(2);

            expect(await call('GET', '/facilities/F9')).toEqual({ status: 404, body: { error: 'Facility not found' } });
        });

        it('validates and stores a new facility', async () => {
            const invalid = await call('POST', '/facilities', { id: 'F3', name: 'Field Post', level: 7 });
            expect(invalid.status).toBe(400);
            expect(invalid.body).toMatchObject({ error: expect.stringMatching(/^level: /) });

            const created = await call('POST', '/facilities', { id: 'F3', name: 'Field Post', level: 3 });
            expect(created).toEqual({
                status: 201,
                body: { id: 'F3', name: 'Field Post', level: 3, acceptedPatients: [] }
            });
            expect(roster.has('F3')).toBe(true);
        });
    });

    describe('/transfers', () => {
        const patient = { id: 'P1', acuity: 'Immediate', location: east(0), requiredResources: { ordinary_icu: 1 } };

        it('rejects an invalid patient', async () => {
            expect(await call('POST', '/transfers/decide', { patient: { id: 'P1' } })).toEqual({
                status: 400,
                body: { error: 'patient.acuity: Required' }
            });
        });

        it('decides, dispatches and records arrival', async () => {
            const decided = await call('POST', '/transfers/decide', { patient });
            expect(decided.status).toBe(200);
            expect(decided.body).toMatchObject({
                action: 'Transfer',
                reasoningCode: 'TRANSFER_OPTIMAL',
                incidentType: 'MCI',
                destination: { facilityId: 'F1' }
            });
            expect(await call('GET', '/transfers/P1')).toMatchObject({
                status: 200,
                body: { status: 'Awaiting Transfer', assignedFacilityId: 'F1' }
            });

            const dispatched = await call('POST', '/transfers/P1/dispatch');
            expect(dispatched).toMatchObject({
                status: 200,
                body: {
                    record: { status: 'In-Transfer' },
                    facility: { id: 'F1', resources: { ordinary_icu: 1 }, acceptedPatients: ['P1'] }
                }
            });
            expect(await call('POST', '/transfers/P1/dispatch')).toEqual({
                status: 400,
                body: { error: 'Transfer is In-Transfer, not awaiting dispatch' }
            });

            expect(await call('POST', '/transfers/P1/arrive')).toMatchObject({
                status: 200,
                body: { status: 'Arrived' }
            });
        });

        it('refuses to decide again once the transfer has been dispatched', async () => {
            await call('POST', '/transfers/decide', { patient });
            expect((await call('POST', '/transfers/decide', { patient })).status).toBe(200);
            expect((await call('POST', '/transfers/P1/dispatch')).status).toBe(200);

            expect(await call('POST', '/transfers/decide', { patient })).toEqual({
                status: 400,
                body: { error: 'Transfer for patient P1 is In-Transfer, cannot decide again' }
            });
            expect(await call('POST', '/transfers/batch', { patients: [{ ...patient, id: 'P2' }, patient] })).toEqual({
                status: 400,
                body: { error: 'Transfer for patient P1 is In-Transfer, cannot decide again' }
            });
            expect(await call('POST', '/transfers/P1/dispatch')).toEqual({
                status: 400,
                body: { error: 'Transfer is In-Transfer, not awaiting dispatch' }
            });
            expect(roster.get('F1')?.resources).toEqual({ ordinary_icu: 1 });
            expect(records.has('P2')).toBe(false);

            await call('POST', '/transfers/P1/arrive');
            expect((await call('POST', '/transfers/decide', { patient })).body).toEqual({
                error: 'Transfer for patient P1 is Arrived, cannot decide again'
            });
        });

        it('keeps forfeited patients out of dispatch', async () => {
            const decided = await call('POST', '/transfers/decide', {
                patient: { id: 'P2', acuity: 'Dead', location: east(0) },
                incidentType: 'MEDEVAC'
            });
            expect(decided.body).toMatchObject({ action: 'Forfeit', reasoningCode: 'PATIENT_DECEASED' });

            expect(await call('POST', '/transfers/P2/dispatch')).toEqual({
                status: 400,
                body: { error: 'Transfer is Unassigned, not awaiting dispatch' }
            });
        });

        it('answers 404 for unknown patients', async () => {
            expect(await call('GET', '/transfers/nobody')).toEqual({ status: 404, body: { error: 'Transfer not found' } });
            expect(await call('POST', '/transfers/nobody/arrive')).toEqual({
                status: 404,
                body: { error: 'Transfer not found' }
            });
        });

        it('decides a batch and rejects duplicate ids', async () => {
            const batch = await call('POST', '/transfers/batch', {
                patients: [patient, { ...patient, id: 'P2', acuity: 'Delayed' }]
            });
            expect(batch.status).toBe(200);
            expect(batch.body).toMatchObject({
                decisions: [{ patientId: 'P1', action: 'Transfer' }, { patientId: 'P2', action: 'Transfer' }]
            });
            expect(records.size).toBe(2);

            expect(await call('POST', '/transfers/batch', { patients: [patient, patient] })).toEqual({
                status: 400,
                body: { error: 'patients: Patient ids must be unique within a batch' }
            });
        });
    });
});
