import { SourceSelection } from '../../core/entities/Job.js';
import { ExtractedContent, SourceHit } from '../../core/entities/SourceHit.js';
import { TRUNCATION_NOTICE } from '../../utils/text.js';

export interface ResearchFindings {
  query: string;
  sources: SourceSelection;
  /** Number of extracted sources the job aimed for */
  target: number;
  hits: readonly SourceHit[];
  extracted: readonly ExtractedContent[];
  errors: readonly string[];
}

const SEPARATOR = '='.repeat(40);

function describeSources(sources: SourceSelection, forSummary = false): string {
  if (sources === 'both') {
    return forSummary ? 'web and academic databases' : 'web and academic sources';
  }
  return `${sources} sources`;
}

export function summarizeFindings(findings: ResearchFindings): string {
  const { query, hits, extracted, target } = findings;
  let summary = `Completed research on: ${query}\n`;
  summary += `Found ${hits.length} potential sources from ${describeSources(findings.sources, true)}\n`;
  summary += `Successfully extracted valid content from ${extracted.length} high-quality sources`;

  if (extracted.length === target) {
    summary += ` (target of ${target} achieved)\n`;
  } else if (extracted.length < target) {
    summary += ` (target was ${target}, but only ${extracted.length} valid sources found)\n`;
  } else {
    summary += ` (exceeded target of ${target})\n`;
  }

  if (extracted.length < hits.length) {
    summary += `Filtered out ${hits.length - extracted.length} sources with restricted access or low-quality content\n`;
  }

  summary += 'The information above represents the most relevant and accessible content found on this topic.';
  return summary;
}

/**
 * Render research findings as the plain-text `raw_data` of a job, cut to `maxSize` characters
 */
export function formatRawData(findings: ResearchFindings, maxSize: number): string {
  let result = `Research Query: ${findings.query}\n\n`;
  result += `Searched ${describeSources(findings.sources)} - Found ${findings.hits.length} results\n\n`;

  if (findings.hits.length > 0) {
    result += 'SEARCH RESULTS:\n';
    findings.hits.forEach((hit, i) => {
      result += `${i + 1}. ${hit.title}\n`;
      result += `   URL: ${hit.url}\n`;
      result += `   ${hit.snippet}\n\n`;
    });
  }

  if (findings.extracted.length > 0) {
    result += `DETAILED CONTENT FROM TOP ${findings.extracted.length} SOURCES:\n\n`;
    findings.extracted.forEach((content, i) => {
      result += `${SEPARATOR}\nSOURCE ${i + 1}: ${content.title}\n${SEPARATOR}\n\n`;
      result += `URL: ${content.url}\n`;
      result += `Description: ${content.description}\n\n`;
      result += `Content:\n${content.content}\n\n`;
    });
  }

  result += '\nRESEARCH SUMMARY:\n';
  result += summarizeFindings(findings);

  if (findings.errors.length > 0) {
    result += '\n\nERRORS ENCOUNTERED:\n';
    for (const error of findings.errors) {
      result += `- ${error}\n`;
    }
  }

  if (result.length > maxSize) {
    const notice = `\n\n${TRUNCATION_NOTICE}`;
    result = result.slice(0, Math.max(0, maxSize - notice.length)) + notice;
  }

  return result;
}
