/**
 * Parsers for agent responses.
 *
 * The executor returns raw text; structure is read here so that loop routing
 * depends on a fixed verdict token rather than on prose.
 */

import { ReviewVerdict } from '../../types';

export interface ParsedReview {
  verdict: ReviewVerdict;
  feedback: string;
  /** False when the response carried no verdict token */
  tokenFound: boolean;
}

const VERDICT_PATTERN = /^[ \t]*\**VERDICT\**[ \t]*:[ \t]*\**[ \t]*(APPROVED|NEEDS[_ ]REVISION)\b.*$/im;
const FEEDBACK_PATTERN = /^[ \t]*\**FEEDBACK\**[ \t]*:[ \t]*\**/im;
const FILE_HEADER_PATTERN = /^\s*===\s*FILE:\s*(.+?)\s*===\s*$/;
const WHOLE_FENCE_PATTERN = /^```[^\n]*\n([\s\S]*?)\n?```$/;

export const DEFAULT_REVISION_FEEDBACK = 'The reviewer rejected the code without details. Re-check every required operation against the requirement.';

export function parseReviewVerdict(response: string): ParsedReview {
  const text = response.trim();
  const verdictMatch = text.match(VERDICT_PATTERN);

  if (!verdictMatch || verdictMatch.index === undefined) {
    return {
      verdict: 'needs_revision',
      feedback: text || DEFAULT_REVISION_FEEDBACK,
      tokenFound: false,
    };
  }

  const verdict: ReviewVerdict = verdictMatch[1].toUpperCase() === 'APPROVED' ? 'approved' : 'needs_revision';

  // Feedback follows the verdict line; text around it is used only when that marker is absent
  const afterVerdict = text.slice(verdictMatch.index + verdictMatch[0].length);
  const feedbackMatch = afterVerdict.match(FEEDBACK_PATTERN);
  let feedback: string;
  if (feedbackMatch && feedbackMatch.index !== undefined) {
    feedback = afterVerdict.slice(feedbackMatch.index + feedbackMatch[0].length).trim();
  } else {
    feedback = (text.slice(0, verdictMatch.index) + afterVerdict).replace(FEEDBACK_PATTERN, '').trim();
  }

  if (verdict === 'needs_revision' && !feedback) {
    feedback = DEFAULT_REVISION_FEEDBACK;
  }

  return { verdict, feedback, tokenFound: true };
}

/**
 * Strip a Markdown fence that wraps the whole response.
 */
export function extractCode(response: string): string {
  const text = response.trim();
  const fenced = text.match(WHOLE_FENCE_PATTERN);
  return fenced ? fenced[1] : text;
}

/**
 * Split a deployment response into files by `=== FILE: name ===` headers.
 * A response without headers is taken as a single run script.
 */
export function parseDeploymentFiles(response: string): Record<string, string> {
  const files: Record<string, string> = {};
  let current: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (current !== null) {
      files[current] = extractCode(buffer.join('\n'));
    }
  };

  for (const line of response.split('\n')) {
    const header = line.match(FILE_HEADER_PATTERN);
    if (header) {
      flush();
      current = header[1];
      buffer = [];
    } else if (current !== null) {
      buffer.push(line);
    }
  }
  flush();

  if (Object.keys(files).length === 0) {
    const script = extractCode(response);
    return script ? { 'run.sh': script } : {};
  }

  return files;
}
