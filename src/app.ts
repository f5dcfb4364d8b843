// src/app.ts

import express from 'express';
import { Facility } from './models/Facility';
import { TransferRecord } from './models/TransferRecord';
import { TransferDecisionEngine } from './engine/transferDecisionEngine';
import { createFacilityRoutes } from './routes/facilityRoutes';
import { createTransferRoutes } from './routes/transferRoutes';

export interface AppDependencies {
    roster: Map<string, Facility>;
    records: Map<string, TransferRecord>;
    engine: TransferDecisionEngine;
}

/**
 * Express application setup
 *
 * In-memory data stores:
 * - roster: Facility snapshot the engine reads on every decision
 * - records: Transfer lifecycle per patient id
 *
 * Listening is left to server.ts so tests can mount the app on any port.
 */
export function createApp({ roster, records, engine }: AppDependencies): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/facilities', createFacilityRoutes(roster));
    app.use('/transfers', createTransferRoutes(records, roster, engine));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            facilities: roster.size,
            transfers: records.size
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        console.error('Error:', err.message);
        res.status(500).json({ error: err.message });
    });

    return app;
}
