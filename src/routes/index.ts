import { Router } from 'express';
import { ApplicationController } from '../controllers/ApplicationController';
import { ReviewController } from '../controllers/ReviewController';
import { IngestionController } from '../controllers/IngestionController';
import { ApplicationRepository } from '../repositories/ApplicationRepository';
import { ReviewService } from '../services/review/ReviewService';
import { IngestionService } from '../services/ingestion/IngestionService';
import { PipelineFactory } from '../services/pipeline/createPipeline';

export interface RouteDependencies {
  applications: ApplicationRepository;
  reviewService: ReviewService;
  ingestionService: IngestionService;
  pipelineFactory: PipelineFactory;
}

/**
 * Initialize and configure all API routes
 */
export function createRoutes(deps: RouteDependencies): Router {
  const router = Router();

  // Initialize controllers
  const applicationController = new ApplicationController(deps.applications, deps.pipelineFactory);
  const reviewController = new ReviewController(deps.reviewService);
  const ingestionController = new IngestionController(deps.ingestionService);

  // Application routes
  router.get('/applications', applicationController.listApplications.bind(applicationController));
  router.post('/applications', applicationController.createApplication.bind(applicationController));
  router.post('/applications/parse', applicationController.parseMessage.bind(applicationController));
  router.get('/applications/:id', applicationController.getApplication.bind(applicationController));
  router.get('/export', applicationController.exportCsv.bind(applicationController));

  // Review queue routes
  router.get('/review', reviewController.listPending.bind(reviewController));
  router.post('/review/:messageId/accept', reviewController.accept.bind(reviewController));
  router.post('/review/:messageId/dismiss', reviewController.dismiss.bind(reviewController));

  // Ingestion routes
  router.post('/ingestion/run', ingestionController.triggerRun.bind(ingestionController));
  router.post('/ingestion/cancel', ingestionController.cancelRun.bind(ingestionController));
  router.get('/ingestion/runs', ingestionController.listRuns.bind(ingestionController));

  return router;
}
