// src/routes/transferRoutes.ts

import { Router, Request, Response, NextFunction } from 'express';
import { Facility } from '../models/Facility';
import { TransferRecord, TransferStatus } from '../models/TransferRecord';
import { TransferDecisionEngine } from '../engine/transferDecisionEngine';
import {
    handlePatientArrival,
    handleTransferDispatch,
    openTransferRecord
} from '../events/transferDispatchHandler';
import { BatchRequestSchema, DecideRequestSchema, formatZodError } from '../validation/schemas';

/**
 * Transfer routes - HTTP mapping only
 * Decisions come from the engine, lifecycle changes from events
 */
export function createTransferRoutes(
    records: Map<string, TransferRecord>,
    roster: Map<string, Facility>,
    engine: TransferDecisionEngine
): Router {
    const router = Router();

    /**
     * Error for the first patient whose transfer has already left,
     * null when every patient may be (re-)decided
     */
    function lockedTransferError(patientIds: string[]): string | null {
        for (const patientId of patientIds) {
            const status = records.get(patientId)?.status;
            if (status === TransferStatus.IN_TRANSFER || status === TransferStatus.ARRIVED) {
                return `Transfer for patient ${patientId} is ${status}, cannot decide again`;
            }
        }
        return null;
    }

    /**
     * Decide for one patient
     * POST /transfers/decide
     * Body: { patient, incidentType? }
     * Replaces an Unassigned / Awaiting Transfer record; refused once dispatched
     */
    router.post('/decide', (req: Request, res: Response, next: NextFunction) => {
        const parsed = DecideRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: formatZodError(parsed.error) });
            return;
        }

        const { patient, incidentType } = parsed.data;
        const locked = lockedTransferError([patient.id]);
        if (locked) {
            res.status(400).json({ error: locked });
            return;
        }

        engine
            .decide(patient, incidentType)
            .then(decision => {
                // A dispatch may have landed while the engine was deciding
                const lockedNow = lockedTransferError([patient.id]);
                if (lockedNow) {
                    res.status(400).json({ error: lockedNow });
                    return;
                }
                records.set(patient.id, openTransferRecord(patient, incidentType, decision));
                res.json(decision);
            })
            .catch(next);
    });

    /**
     * Decide for a batch sharing facility capacity
     * POST /transfers/batch
     * Body: { patients, incidentType? }
     */
    router.post('/batch', (req: Request, res: Response, next: NextFunction) => {
        const parsed = BatchRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: formatZodError(parsed.error) });
            return;
        }

        const { patients, incidentType } = parsed.data;
        const locked = lockedTransferError(patients.map(p => p.id));
        if (locked) {
            res.status(400).json({ error: locked });
            return;
        }

        engine
            .decideBatch(patients, incidentType)
            .then(decisions => {
                const lockedNow = lockedTransferError(patients.map(p => p.id));
                if (lockedNow) {
                    res.status(400).json({ error: lockedNow });
                    return;
                }
                decisions.forEach((decision, i) => {
                    records.set(patients[i].id, openTransferRecord(patients[i], incidentType, decision));
                });
                res.json({ decisions });
            })
            .catch(next);
    });

    /**
     * GET /transfers/:patientId
     */
    router.get('/:patientId', (req: Request, res: Response) => {
        const record = records.get(req.params.patientId);
        if (!record) {
            res.status(404).json({ error: 'Transfer not found' });
            return;
        }
        res.json(record);
    });

    /**
     * Dispatch an awaiting transfer
     * POST /transfers/:patientId/dispatch
     */
    router.post('/:patientId/dispatch', (req: Request, res: Response) => {
        const record = records.get(req.params.patientId);
        if (!record) {
            res.status(404).json({ error: 'Transfer not found' });
            return;
        }

        if (record.status !== TransferStatus.AWAITING_TRANSFER) {
            res.status(400).json({ error: `Transfer is ${record.status}, not awaiting dispatch` });
            return;
        }

        if (!record.assignedFacilityId || !roster.has(record.assignedFacilityId)) {
            res.status(400).json({ error: 'Assigned facility is not in the roster' });
            return;
        }

        const facility = handleTransferDispatch(record, roster);
        res.json({ record, facility });
    });

    /**
     * Record arrival at the receiving facility
     * POST /transfers/:patientId/arrive
     */
    router.post('/:patientId/arrive', (req: Request, res: Response) => {
        const record = records.get(req.params.patientId);
        if (!record) {
            res.status(404).json({ error: 'Transfer not found' });
            return;
        }

        if (record.status !== TransferStatus.IN_TRANSFER) {
            res.status(400).json({ error: `Transfer is ${record.status}, not in transfer` });
            return;
        }

        handlePatientArrival(record);
        res.json(record);
    });

    return router;
}
