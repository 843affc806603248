import express from 'express';
import type { Express } from 'express';

/**
 * Liveness endpoint for the hosting platform. Carries no bot state.
 */
export function createHealthServer(): Express {
    const app = express();

    app.get('/health', (req, res) => {
        res.json({ ok: true, timestamp: new Date().toISOString() });
    });

    // Platforms probe different paths; any GET counts as alive.
    app.use((req, res) => {
        if (req.method === 'GET' || req.method === 'HEAD') {
            res.status(200).send('ok');
            return;
        }
        res.status(404).send('Not found');
    });

    return app;
}
