import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { ExtractionError } from '../../utils/errors.js';
import type { LayoutModel } from './LayoutModel.interface.js';
import type { LayoutAnalysisRequest, LayoutAnalysisResponse } from '../../types/extraction.types.js';
import { OpenAIClientFactory } from '../llm/OpenAIClientFactory.js';
import { parseLayoutJson } from './layout-response.schema.js';
import { LAYOUT_EXTRACTION_SYSTEM_PROMPT, LAYOUT_EXTRACTION_USER_PROMPT } from './prompts/layout-extraction.js';

/** Uses a vision-capable chat model as the layout model, one page image per request. */
export class OpenAIVisionLayoutModel implements LayoutModel {
  readonly name = 'openai-vision';

  constructor(
    private client: OpenAI,
    private model: string
  ) {}

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async analyzePage(request: LayoutAnalysisRequest, signal: AbortSignal): Promise<LayoutAnalysisResponse> {
    const { page } = request;
    const dataUrl = `data:${page.mediaType};base64,${page.image.toString('base64')}`;

    logger.debug(
      { documentType: request.documentType, page: page.page, imageBytes: page.image.length },
      'Sending page to vision layout model'
    );

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: LAYOUT_EXTRACTION_SYSTEM_PROMPT },
            {
              role: 'user',
              content: [
                { type: 'text', text: LAYOUT_EXTRACTION_USER_PROMPT(request.documentType, page.page, request.roles) },
                { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
              ],
            },
          ],
          temperature: 0,
          response_format: { type: 'json_object' },
        },
        { signal }
      );
    } catch (error) {
      throw OpenAIClientFactory.toModelError(error, 'Vision layout model');
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new ExtractionError('Empty response from vision layout model', { page: page.page });
    }

    const parsed = parseLayoutJson(content, this.name);

    return {
      spans: parsed.spans,
      metadata: {
        modelUsed: completion.model,
        timestamp: new Date().toISOString(),
        tokensUsed: completion.usage?.total_tokens,
      },
    };
  }
}
