/**
 * Structural check for refined requirements.
 *
 * The requirement agent is asked for fixed sections; this reports the ones it
 * left out. Findings are warnings only.
 */

export interface RequirementSection {
  name: string;
  pattern: RegExp;
}

export const REQUIRED_SECTIONS: readonly RequirementSection[] = [
  { name: 'purpose', pattern: /purpose|overview|objective/i },
  { name: 'inputs', pattern: /inputs?\b/i },
  { name: 'outputs', pattern: /outputs?\b|returns?\b/i },
  { name: 'error handling', pattern: /error[s]?\b|exception|failure/i },
  { name: 'assumptions', pattern: /assumption/i },
  { name: 'non-goals', pattern: /non[- ]?goals?|out of scope/i },
];

export interface RequirementCheckResult {
  valid: boolean;
  missingSections: string[];
  warnings: string[];
}

/**
 * Lines that read as section titles: Markdown headings, numbered titles, or
 * short lines ending in a colon, with bold markers removed.
 */
export function extractHeadings(text: string): string[] {
  const headings: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim().replace(/\*\*/g, '');
    if (!line) continue;

    const heading = line.match(/^#{1,6}\s+(.+)$/);
    if (heading) {
      headings.push(heading[1].trim());
      continue;
    }
    const numbered = line.match(/^\d+[.)]\s+(.{1,60})$/);
    if (numbered && !numbered[1].includes('. ')) {
      headings.push(numbered[1].trim());
      continue;
    }
    if (line.length <= 60 && line.endsWith(':')) {
      headings.push(line.slice(0, -1).trim());
    }
  }
  return headings;
}

export function checkRequirementStructure(text: string): RequirementCheckResult {
  const headings = extractHeadings(text);
  const missingSections = REQUIRED_SECTIONS
    .filter(section => !headings.some(heading => section.pattern.test(heading)))
    .map(section => section.name);

  return {
    valid: missingSections.length === 0,
    missingSections,
    warnings: missingSections.map(name => `Refined requirement has no "${name}" section`),
  };
}
