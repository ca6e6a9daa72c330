import { IReportProvider, ReportRequest } from '../../core/interfaces/IReportGenerator.js';
import { IOllamaClient } from '../../core/interfaces/IOllamaClient.js';
import { GenerationError, ResearchError, errorMessage } from '../../core/errors/ResearchErrors.js';
import { REPORT_SYSTEM_PROMPT, buildReportPrompt } from './reportPrompt.js';

export class OllamaReportProvider implements IReportProvider {
  readonly name = 'ollama';

  constructor(private readonly client: IOllamaClient) {}

  async generate(request: ReportRequest): Promise<string> {
    let text: string;
    try {
      text = await this.client.generate(
        request.model,
        buildReportPrompt(request.rawData, request.query),
        REPORT_SYSTEM_PROMPT
      );
    } catch (error) {
      if (error instanceof ResearchError) throw error;
      throw new GenerationError(this.name, errorMessage(error), { cause: error });
    }

    if (!text.trim()) {
      throw new GenerationError(this.name, 'empty response');
    }
    return text;
  }
}
