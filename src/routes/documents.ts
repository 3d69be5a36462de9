import { Router } from 'express';
import { z } from 'zod';
import type { ArtifactService } from '../services/artifacts';
import type { TaskDispatcher } from '../services/tasks/dispatcher';
import { NotFoundError } from '../utils/errors';

const submitDocumentSchema = z.object({
  sourceRef: z.string().trim().min(1),
  cleanRequested: z.boolean().default(false),
});

const artifactParamsSchema = z.object({
  documentId: z.string().regex(/^[a-zA-Z0-9_-]+$/),
  artifact: z.enum(['transcript', 'summary']),
});

export interface DocumentRouteDeps {
  dispatcher: TaskDispatcher;
  artifacts: ArtifactService;
}

export function createDocumentRoutes({ dispatcher, artifacts }: DocumentRouteDeps) {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const validatedData = submitDocumentSchema.parse(req.body);
      const submitted = await dispatcher.submitDocument(validatedData);
      res.status(202).json(submitted);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:documentId/:artifact', async (req, res, next) => {
    try {
      const { documentId, artifact } = artifactParamsSchema.parse(req.params);
      const content = await artifacts.readDocumentArtifact(documentId, artifact);
      if (content === null) throw new NotFoundError(`No ${artifact} for ${documentId}`, 'ARTIFACT_NOT_FOUND');
      res.type('text/markdown').send(content);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
