import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { RecommendationServices } from './services/recommendation/index.js';
import { createRecommendationsRouter } from './controllers/recommendations/recommendations.controller.js';
import { createHealthRouter } from './controllers/health.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware } from './middleware/error.middleware.js';

export function createApp(services: RecommendationServices) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors()); // keep permissive for dev; restrict via env in server.ts if needed

    // Request context & logging (BEFORE body parsing so parse errors carry a traceId)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: '1mb' }));

    app.use(createHealthRouter({
        candidateStore: () => services.candidateStore.isReady(),
        profileStore: () => services.profileStore.isReady(),
        locationStore: () => services.locationStore.isReady()
    }));

    app.use('/api/v1', createRecommendationsRouter(services));

    app.use(errorMiddleware);

    return app;
}
