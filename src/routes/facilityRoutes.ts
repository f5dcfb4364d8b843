// src/routes/facilityRoutes.ts

import { Router, Request, Response } from 'express';
import { Facility } from '../models/Facility';
import { FacilitySchema, formatZodError } from '../validation/schemas';

/**
 * Facility roster routes - HTTP mapping only
 */
export function createFacilityRoutes(roster: Map<string, Facility>): Router {
    const router = Router();

    /**
     * List the roster
     * GET /facilities
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json(Array.from(roster.values()));
    });

    /**
     * GET /facilities/:id
     */
    router.get('/:id', (req: Request, res: Response) => {
        const facility = roster.get(req.params.id);
        if (!facility) {
            res.status(404).json({ error: 'Facility not found' });
            return;
        }
        res.json(facility);
    });

    /**
     * Create or replace a facility
     * POST /facilities
     * Body: Facility
     */
    router.post('/', (req: Request, res: Response) => {
        const parsed = FacilitySchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: formatZodError(parsed.error) });
            return;
        }

        const replaced = roster.has(parsed.data.id);
        roster.set(parsed.data.id, parsed.data);
        res.status(replaced ? 200 : 201).json(parsed.data);
    });

    return router;
}
