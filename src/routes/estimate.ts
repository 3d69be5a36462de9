import { Router } from 'express';
import { z } from 'zod';
import type { PipelineConfig } from '../config/pipeline';
import { checkBudget } from '../services/text-generation/budget';

const estimateSchema = z.object({
  text: z.string().min(1),
});

export function createEstimateRoutes(config: PipelineConfig) {
  const router = Router();

  router.post('/', (req, res, next) => {
    try {
      const { text } = estimateSchema.parse(req.body);
      const estimate = checkBudget(text, config.modelConfig, config.maxCostUsd);
      res.json({
        ...estimate,
        provider: config.provider,
        model: config.model,
        maxCostUsd: config.maxCostUsd,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
