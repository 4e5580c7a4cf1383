/**
 * Tests for prompt composition
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AppError, ErrorCategory } from '../../shared/errors';
import {
  buildStructuredPrompt,
  composeCoverLetterPrompt,
  composeRepairPrompt,
  composeResumePrompt,
  escapePromptText,
  type ResumeTemplates
} from '../../shared/llm';

const templates: ResumeTemplates = {
  baseResume: '\\documentclass{article}\r\n\\begin{document}\r\nJane Placeholder\r\n\\end{document}\r\n',
  profile: '{\n  "name": "Jane Placeholder"\n}'
};

describe('buildStructuredPrompt', () => {
  it('should lay out task, inputs, instructions and output format', () => {
    const prompt = buildStructuredPrompt(
      'Do the task.',
      ['First', 'Second'],
      [{ label: 'Company', value: 'Acme' }],
      'Plain text.'
    );

    expect(prompt).toBe(
      'Do the task.\n\n' +
      'INPUT DATA:\n\n' +
      '### Company\nAcme\n\n' +
      'INSTRUCTIONS:\n1. First\n2. Second\n\n' +
      'OUTPUT FORMAT:\nPlain text.\n'
    );
  });

  it('should omit empty sections', () => {
    expect(buildStructuredPrompt('Only the task.', [])).toBe('Only the task.\n\n');
  });
});

describe('escapePromptText', () => {
  it('should normalize line endings and trim', () => {
    expect(escapePromptText('  a\r\nb\rc  ')).toBe('a\nb\nc');
  });
});

describe('composeResumePrompt', () => {
  it('should embed the company and job description verbatim', () => {
    const prompt = composeResumePrompt(
      { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: false },
      templates
    );

    expect(prompt).toContain('### Company\nAcme\n\n');
    expect(prompt).toContain('### Job description\nBackend engineer\n\n');
  });

  it('should include the normalized base resume and profile', () => {
    const prompt = composeResumePrompt(
      { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: false },
      templates
    );

    expect(prompt).toContain(
      '### Current LaTeX resume\n\\documentclass{article}\n\\begin{document}\nJane Placeholder\n\\end{document}\n\n'
    );
    expect(prompt).toContain('### Candidate profile (JSON)\n{\n  "name": "Jane Placeholder"\n}\n\n');
  });

  it('should leave the profile section out when there is no profile', () => {
    const prompt = composeResumePrompt(
      { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: false },
      { baseResume: templates.baseResume }
    );
    expect(prompt).not.toContain('### Candidate profile (JSON)');
  });

  it('should ask for a single fenced LaTeX document', () => {
    const prompt = composeResumePrompt(
      { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: false },
      templates
    );
    expect(prompt).toContain('inside a single ```latex fenced block');
  });

  it('should keep any non-blank company and job description verbatim', () => {
    const text = fc.string({ minLength: 1, maxLength: 80 }).filter(value => value.trim().length > 0);

    fc.assert(
      fc.property(text, text, (company, jobDescription) => {
        const prompt = composeResumePrompt({ company, jobDescription, wantCoverLetter: false }, templates);
        return (
          prompt.includes(`### Company\n${company}\n\n`) &&
          prompt.includes(`### Job description\n${jobDescription}\n\n`)
        );
      })
    );
  });

  it('should reject a blank company with a validation error', () => {
    let thrown: unknown;
    try {
      composeResumePrompt({ company: '   ', jobDescription: 'Backend engineer', wantCoverLetter: false }, templates);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(AppError);
    if (!(thrown instanceof AppError)) return;
    expect(thrown.category).toBe(ErrorCategory.VALIDATION);
    expect(thrown.userMessage).toBe('Company name is required');
  });

  it('should reject a blank job description', () => {
    expect(() =>
      composeResumePrompt({ company: 'Acme', jobDescription: '', wantCoverLetter: false }, templates)
    ).toThrow('Job description is required');
  });
});

describe('composeCoverLetterPrompt', () => {
  it('should include the tailored resume after the candidate material', () => {
    const prompt = composeCoverLetterPrompt(
      { company: 'Acme', jobDescription: 'Backend engineer', wantCoverLetter: true },
      templates,
      '  \\documentclass{article}TAILORED\\begin{document}\\end{document}  '
    );

    expect(prompt).toContain('### Company\nAcme\n\n');
    expect(prompt).toContain(
      '### Tailored resume\n\\documentclass{article}TAILORED\\begin{document}\\end{document}\n\n'
    );
    expect(prompt.indexOf('### Candidate profile (JSON)')).toBeLessThan(prompt.indexOf('### Tailored resume'));
    expect(prompt).toContain('Dear Hiring Manager,');
  });

  it('should reject a blank company', () => {
    expect(() =>
      composeCoverLetterPrompt({ company: '', jobDescription: 'x', wantCoverLetter: true }, templates, 'resume')
    ).toThrow('Company name is required');
  });
});

describe('composeRepairPrompt', () => {
  it('should quote the unusable reply unchanged', () => {
    const prompt = composeRepairPrompt('Sure! Here is your resume: \\section{Skills}');
    expect(prompt).toContain('### Reply\nSure! Here is your resume: \\section{Skills}\n\n');
    expect(prompt.startsWith('The reply below was supposed to be a complete LaTeX document')).toBe(true);
  });
});
