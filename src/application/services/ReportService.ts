import { IReportGenerator, IReportProvider } from '../../core/interfaces/IReportGenerator.js';
import { GenerationError } from '../../core/errors/ResearchErrors.js';
import { withTimeout } from '../../utils/retry.js';
import { Logger, createLogger } from '../../utils/logger.js';

const PROVIDER_DEFAULT_MODELS: Record<string, string> = {
  ollama: 'llama3.2',
  openai: 'gpt-4o-mini',
  groq: 'llama-3.3-70b-versatile',
};

export interface ReportServiceOptions {
  defaultProvider: string;
  defaultModel: string;
  timeoutMs: number;
}

/**
 * Routes report generation to the configured providers
 */
export class ReportService implements IReportGenerator {
  private providers: Map<string, IReportProvider> = new Map();

  constructor(
    providers: IReportProvider[],
    private readonly options: ReportServiceOptions,
    private readonly logger: Logger = createLogger('ReportService')
  ) {
    for (const provider of providers) {
      this.providers.set(provider.name, provider);
    }
  }

  isAvailable(provider?: string): boolean {
    return this.providers.has(this.resolveProvider(provider));
  }

  listProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  resolveModel(provider?: string, model?: string): string {
    if (model) return model;
    const name = this.resolveProvider(provider);
    if (name === this.options.defaultProvider) return this.options.defaultModel;
    return PROVIDER_DEFAULT_MODELS[name] ?? this.options.defaultModel;
  }

  async generate(rawData: string, query: string, provider?: string, model?: string): Promise<string> {
    const name = this.resolveProvider(provider);
    const target = this.providers.get(name);
    if (!target) {
      throw new GenerationError(name, 'provider is not configured');
    }

    const resolvedModel = this.resolveModel(name, model);
    this.logger.info(`Generating report with ${name}/${resolvedModel}`);

    return withTimeout(
      target.generate({ rawData, query, model: resolvedModel }),
      this.options.timeoutMs,
      () => new GenerationError(name, `timed out after ${this.options.timeoutMs}ms`)
    );
  }

  private resolveProvider(provider?: string): string {
    return (provider ?? this.options.defaultProvider).toLowerCase();
  }
}
