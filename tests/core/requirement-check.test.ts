import { checkRequirementStructure, extractHeadings } from '../../src/core/requirement-check';

describe('extractHeadings', () => {
  it('should collect Markdown, numbered and colon headings', () => {
    const text = [
      '# Calculator',
      '1. Purpose',
      'Adds numbers.',
      '**Inputs:**',
      '- a: first number',
      'Outputs:',
      '2. The function returns the sum. It never rounds.',
    ].join('\n');

    expect(extractHeadings(text)).toEqual(['Calculator', 'Purpose', 'Inputs', 'Outputs']);
  });
});

describe('checkRequirementStructure', () => {
  it('should accept a requirement with every section', () => {
    const text = [
      '## Purpose', 'x',
      '## Inputs', 'x',
      '## Outputs', 'x',
      '## Error Handling', 'x',
      '## Assumptions', 'x',
      '## Non-Goals', 'x',
    ].join('\n');

    expect(checkRequirementStructure(text)).toEqual({ valid: true, missingSections: [], warnings: [] });
  });

  it('should accept alternative section names', () => {
    const text = '## Overview\n## Input\n## Returns\n## Exceptions\n## Assumptions\n## Out of Scope';
    expect(checkRequirementStructure(text).valid).toBe(true);
  });

  it('should report each missing section', () => {
    const result = checkRequirementStructure('## Purpose\nDo things.\n## Inputs\nNone.');

    expect(result.valid).toBe(false);
    expect(result.missingSections).toEqual(['outputs', 'error handling', 'assumptions', 'non-goals']);
    expect(result.warnings[0]).toBe('Refined requirement has no "outputs" section');
  });

  it('should not count words in body text as sections', () => {
    const result = checkRequirementStructure('## Purpose\nThe inputs and outputs are numbers and errors are raised.');
    expect(result.missingSections).toContain('inputs');
    expect(result.missingSections).toContain('outputs');
  });
});
