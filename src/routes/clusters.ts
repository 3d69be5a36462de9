import { Router } from 'express';
import { z } from 'zod';
import { MAX_CLUSTER_NAME_LENGTH, MAX_SOURCES_PER_CLUSTER } from '../config/constants';
import type { ArtifactService } from '../services/artifacts';
import { toClusterSummary } from '../services/clusters/cluster.types';
import type { ClusterStore } from '../services/clusters/clusterStore';
import type { TaskDispatcher } from '../services/tasks/dispatcher';
import { NotFoundError } from '../utils/errors';

const createClusterSchema = z.object({
  name: z.string().trim().min(1).max(MAX_CLUSTER_NAME_LENGTH),
  sourceRefs: z.array(z.string().trim().min(1)).min(1).max(MAX_SOURCES_PER_CLUSTER),
  cleanRequested: z.boolean().default(false),
});

export interface ClusterRouteDeps {
  dispatcher: TaskDispatcher;
  clusters: ClusterStore;
  artifacts: ArtifactService;
}

export function createClusterRoutes({ dispatcher, clusters, artifacts }: ClusterRouteDeps) {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const validatedData = createClusterSchema.parse(req.body);
      const submitted = await dispatcher.submitCluster(validatedData);
      res.status(202).json(submitted);
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (_req, res, next) => {
    try {
      const units = await clusters.listAll();
      res.json({ clusters: units.map(toClusterSummary) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId', async (req, res, next) => {
    try {
      const cluster = await clusters.get(req.params.sessionId);
      if (!cluster) throw new NotFoundError('Cluster not found', 'CLUSTER_NOT_FOUND');
      res.json({ cluster });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:sessionId/resume', async (req, res, next) => {
    try {
      const submitted = await dispatcher.resumeCluster(req.params.sessionId);
      res.status(202).json(submitted);
    } catch (error) {
      next(error);
    }
  });

  router.post('/:sessionId/retry', async (req, res, next) => {
    try {
      const submitted = await dispatcher.retryCluster(req.params.sessionId);
      res.status(202).json(submitted);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId/report', async (req, res, next) => {
    try {
      const report = await artifacts.readReport(req.params.sessionId);
      if (report === null) throw new NotFoundError('Report not found', 'ARTIFACT_NOT_FOUND');
      res.type('text/markdown').send(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
