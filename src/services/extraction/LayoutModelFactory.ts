import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { ExtractionConfig } from '../../config/index.js';
import type { LayoutModel } from './LayoutModel.interface.js';
import { OpenAIVisionLayoutModel } from './OpenAIVisionLayoutModel.js';
import { LayoutServiceModel } from './LayoutServiceModel.js';
import { OpenAIClientFactory } from '../llm/OpenAIClientFactory.js';

export class LayoutModelFactory {
  static create(config: ExtractionConfig): LayoutModel {
    switch (config.provider) {
      case 'openai':
        logger.info({ model: config.model }, 'Initializing vision layout model');
        return new OpenAIVisionLayoutModel(
          OpenAIClientFactory.create({
            apiKey: config.apiKey,
            baseUrl: config.baseUrl,
            timeoutMs: config.callTimeoutMs,
          }),
          config.model
        );
      case 'layout-service':
        if (!config.baseUrl) {
          throw new ConfigurationError('Layout service requires a base URL', [
            { field: 'extraction.baseUrl', message: 'Required when extraction provider is layout-service' },
          ]);
        }
        logger.info({ baseUrl: config.baseUrl }, 'Initializing layout service model');
        return new LayoutServiceModel(config.baseUrl, config.callTimeoutMs, config.model);
    }
  }
}
