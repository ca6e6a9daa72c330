export const REPORT_SYSTEM_PROMPT =
  'You are a professional research analyst creating comprehensive reports.';

export function buildReportPrompt(rawData: string, query: string): string {
  return `Based on the following research data, create a comprehensive research report on: "${query}"

Research Data:
${rawData}

Please create a well-structured report with the following sections:
1. Executive Summary
2. Key Findings
3. Detailed Analysis
4. Sources and References
5. Conclusions and Implications

Format the output in clean markdown with proper headings, bullet points, and citations where appropriate.
Make the report professional, comprehensive, and easy to read.
`;
}
