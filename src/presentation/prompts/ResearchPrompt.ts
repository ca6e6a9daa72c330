import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export function buildResearchPrompt(topic: string): string {
  return [
    `I need comprehensive research on: ${topic}`,
    '',
    'Work through these stages:',
    '',
    '1. EXPLORE: call the deep-research tool with sources "both" to collect web and academic material.',
    '2. SYNTHESIZE: organize the findings into key concepts, competing perspectives and open gaps. Put the synthesis in an artifact with sections for method, findings and open questions.',
    '3. VISUALIZE: where the material supports it, add timelines, comparison tables, concept maps or charts to the artifact.',
    '4. FOLLOW UP: pick two or three aspects that need more depth and run deep-research again with narrower queries.',
    '5. CONSOLIDATE: fold everything into a final artifact with an executive summary, method, findings, analysis and conclusions, noting what the follow-up research changed.',
    '6. CITE: end with a reference list in APA 7th edition. Use "n.d." when a source has no date.',
    '   Web: Author, A. A. (Year, Month Day). Title of page. Site Name. URL',
    '   Academic: Author, A. A., & Author, B. B. (Year). Title of article. Journal Name, Volume(Issue), pages. DOI or URL',
  ].join('\n');
}

/**
 * Register the research-prompt prompt
 */
export function registerResearchPrompt(server: McpServer) {
  server.prompt(
    'research-prompt',
    'Multi-stage research process on a topic, with follow-up queries and APA citations',
    { topic: z.string().describe('The topic to research') },
    ({ topic }) => ({
      messages: [
        {
          role: 'user',
          content: { type: 'text', text: buildResearchPrompt(topic) },
        },
      ],
    })
  );
}
