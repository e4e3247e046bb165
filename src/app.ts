import express from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { requestLogger } from './middleware/requestLogger';
import { errorHandler } from './middleware/error';
import { notFound } from './middleware/notFound';
import healthRoutes from './routes/health';
import { projectRoutes } from './routes/projects';
import { collaboratorRoutes } from './routes/collaborators';
import { invitationRoutes } from './routes/invitations';
import { meRoutes } from './routes/me';
import type { Services } from './services';

/** Build the plain Express application (no http.Server, no sockets). */
export function buildExpressApp(services: Services) {
  const app = express();

  app.use(requestLogger);
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  // REST routes
  app.use('/api', healthRoutes);
  app.use('/api', projectRoutes(services));
  app.use('/api', collaboratorRoutes(services));
  app.use('/api', invitationRoutes(services));
  app.use('/api', meRoutes(services));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
