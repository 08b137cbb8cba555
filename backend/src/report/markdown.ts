/**
 * Markdown renderings of a proposal bundle.
 */

import type { EntityProfile, ProposalBundle } from '@usecase-studio/shared-types';

const RESOURCE_FILE_HEADER = '# Relevant Resource Links\n\n';

function joinList(values: readonly unknown[]): string {
  return values.filter((value): value is string => typeof value === 'string').join(', ');
}

function renderResearchSummary(profile: EntityProfile): string[] {
  return [
    `- **Industry:** ${profile.industry}`,
    `- **Segment:** ${profile.segment}`,
    `- **Key Offerings:** ${joinList(profile.offerings)}`,
    `- **Strategic Focus:** ${joinList(profile.strategicFocus)}`,
  ];
}

/** Whole proposal as one Markdown document. */
export function renderProposalMarkdown(bundle: ProposalBundle): string {
  const subject = bundle.researchData?.inputName ?? '';
  const lines: string[] = [`# AI/GenAI Use Case Proposal${subject ? `: ${subject}` : ''}`, ''];

  if (bundle.status === 'failed_research') {
    lines.push('Could not generate a proposal due to initial research failure.', '');
    if (bundle.researchData) {
      lines.push('## Research Attempt Summary', '', ...renderResearchSummary(bundle.researchData));
    } else {
      lines.push('No research data was collected.');
    }
    return `${lines.join('\n')}\n`;
  }

  if (bundle.researchData) {
    lines.push('## Research Summary', '', ...renderResearchSummary(bundle.researchData), '');
  }

  lines.push('## Proposed AI/GenAI Use Cases', '');
  if (bundle.useCases.length === 0) {
    lines.push('No use cases were generated.', '');
  }
  bundle.useCases.forEach((useCase, index) => {
    lines.push(
      `### ${index + 1}. ${useCase.title}`,
      '',
      `- **Description:** ${useCase.description}`,
      `- **AI Application:** ${useCase.aiApplication}`,
      `- **Potential Benefit:** ${useCase.potentialBenefit}`,
      `- **Relevance:** ${useCase.relevance}`,
      '',
    );
  });

  lines.push('## Relevant Resource Assets', '');
  const withLinks = Object.entries(bundle.resourceLinks).filter(([, links]) => links.length > 0);
  if (withLinks.length === 0) {
    lines.push('No specific resource links found for the generated use cases.', '');
  }
  for (const [title, links] of withLinks) {
    lines.push(`### Resources for: ${title}`, '');
    for (const resource of links) {
      lines.push(`- [${resource.title || resource.link}](${resource.link})`);
    }
    lines.push('');
  }

  lines.push('## General GenAI Solution Suggestions', '');
  bundle.genaiSuggestions.forEach((suggestion, index) => {
    lines.push(
      `### ${index + 1}. ${suggestion.title}`,
      '',
      `- **Application:** ${suggestion.application}`,
      `- **Potential Benefit:** ${suggestion.potentialBenefit}`,
      `- **Fit Area:** ${suggestion.fitArea}`,
      '',
    );
  });

  return `${lines.join('\n').trimEnd()}\n`;
}

/**
 * Downloadable resource file. Only use cases with at least one link get a
 * section; null when nothing was collected.
 */
export function renderResourceLinksMarkdown(bundle: ProposalBundle): string | null {
  let content = RESOURCE_FILE_HEADER;
  let found = false;

  for (const [title, links] of Object.entries(bundle.resourceLinks)) {
    if (links.length === 0) continue;
    found = true;
    content += `## ${title}\n\n`;
    for (const resource of links) {
      content += `- [${resource.title || resource.link}](${resource.link})\n`;
    }
    content += '\n';
  }

  return found ? content : null;
}

export function resourceFileName(inputName: string | undefined): string {
  const base = (inputName || 'resources').replace(/[ /]/g, '_');
  return `${base}_ai_resources.md`;
}
