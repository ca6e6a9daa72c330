/**
 * Interface for report generation providers
 */
export interface ReportRequest {
  rawData: string;
  query: string;
  model: string;
}

export interface IReportProvider {
  readonly name: string;

  generate(request: ReportRequest): Promise<string>;
}

/**
 * Opaque report generation step called by the orchestrator.
 * `isAvailable` is false when no credentials are configured for the provider,
 * in which case the orchestrator skips generation without calling `generate`.
 */
export interface IReportGenerator {
  isAvailable(provider?: string): boolean;

  generate(rawData: string, query: string, provider?: string, model?: string): Promise<string>;

  listProviders(): string[];
}
