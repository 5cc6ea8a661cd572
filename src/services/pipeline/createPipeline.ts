import { Database } from 'sqlite';
import { AppConfig } from '../../config';
import { ApplicationRepository } from '../../repositories/ApplicationRepository';
import { ReviewQueueRepository } from '../../repositories/ReviewQueueRepository';
import { RelevanceClassifier } from '../ml/RelevanceClassifier';
import { loadRelevanceModel } from '../ml/RelevanceModel';
import { IngestionPipeline } from './IngestionPipeline';

export type PipelineConfig = Pick<AppConfig, 'modelPath' | 'relevanceThreshold' | 'reviewMargin' | 'pipelineConcurrency' | 'pipelineDebug'>;

export interface PipelineStores {
  applications: ApplicationRepository;
  reviewQueue: ReviewQueueRepository;
}

export type PipelineFactory = () => Promise<IngestionPipeline>;

export function createStores(db: Database): PipelineStores {
  return {
    applications: new ApplicationRepository(db),
    reviewQueue: new ReviewQueueRepository(db)
  };
}

/**
 * Factory that loads the model fresh for every pipeline it builds.
 * Rejects with ClassificationLoadError when the artifact is unusable.
 */
export function createPipelineFactory(config: PipelineConfig, stores: PipelineStores): PipelineFactory {
  return async () => {
    const model = await loadRelevanceModel(config.modelPath);
    const classifier = new RelevanceClassifier(model, {
      threshold: config.relevanceThreshold,
      reviewMargin: config.reviewMargin
    });

    if (config.pipelineDebug) {
      console.log(`🧠 [PIPELINE] Loaded relevance model ${model.version} (threshold ${classifier.threshold})`);
    }

    return new IngestionPipeline(
      { classifier, applications: stores.applications, reviewQueue: stores.reviewQueue },
      { concurrency: config.pipelineConcurrency, debug: config.pipelineDebug }
    );
  };
}
