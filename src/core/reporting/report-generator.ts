import * as fs from 'fs-extra';
import * as path from 'path';
import { WorkflowDocument } from '../workflow/state';

const RULE = '='.repeat(60);
const NOT_GENERATED = '(not generated)';

function section(lines: string[], title: string, body: string): void {
  lines.push('');
  lines.push(`--- ${title} ---`);
  lines.push('');
  lines.push(body.trim() || NOT_GENERATED);
}

function bulletList(lines: string[], title: string, items: string[]): void {
  if (items.length === 0) return;
  lines.push('');
  lines.push(`${title}:`);
  for (const item of items) {
    lines.push(`- ${item}`);
  }
}

/**
 * Plain-text report of a finished run: summary first, then one section per
 * document field.
 */
export function renderReport(document: WorkflowDocument): string {
  const lines: string[] = [];

  lines.push('REQ2CODE WORKFLOW REPORT');
  lines.push(RULE);
  lines.push(`Status: ${document.status}`);
  lines.push(`Review iterations: ${document.iterationCount}`);
  lines.push(`Coding attempts: ${document.codingAttempts}`);
  lines.push(`Final verdict: ${document.reviewVerdict || 'none'}`);
  if (document.degraded) {
    lines.push('Degraded: artifacts were generated from code that was never approved');
  }

  bulletList(lines, 'Progress', document.messages);
  bulletList(lines, 'Warnings', [...document.requirementWarnings, ...document.warnings]);
  bulletList(lines, 'Failures', Object.entries(document.failures).map(([field, message]) => `${field}: ${message}`));

  section(lines, 'REFINED REQUIREMENT', document.refinedRequirement);
  section(lines, 'CODE', document.code);
  section(lines, 'REVIEW FEEDBACK', document.reviewFeedback);
  section(lines, 'DOCUMENTATION', document.documentation);
  section(lines, 'TESTS', document.tests);

  const files = document.deploymentConfig ? Object.entries(document.deploymentConfig.files) : [];
  section(lines, 'DEPLOYMENT CONFIGURATION', files.map(([name, content]) => `# ${name}\n${content}`).join('\n\n'));

  lines.push('');
  return lines.join('\n');
}

/**
 * Write the report to `reportPath`, creating its directory.
 */
export async function saveReport(document: WorkflowDocument, reportPath: string): Promise<string> {
  const resolved = path.resolve(reportPath);
  await fs.ensureDir(path.dirname(resolved));
  await fs.writeFile(resolved, renderReport(document), 'utf-8');
  return resolved;
}
