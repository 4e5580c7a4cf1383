/**
 * LLM Prompts
 *
 * Prompt composition for resume, cover letter and output-repair calls.
 * Company name and job description are embedded exactly as submitted.
 */

import { ErrorHandler } from '../errors';
import type { GenerationRequest } from '../types';

/**
 * Candidate material every resume prompt is built from
 */
export interface ResumeTemplates {
  /** The candidate's current resume, a complete LaTeX document */
  baseResume: string;
  /** Free-form candidate profile, serialized JSON */
  profile?: string;
}

export interface PromptInput {
  label: string;
  value: string;
}

export const RESUME_SYSTEM_PROMPT =
  'You are a professional resume writer who tailors LaTeX resumes to specific job descriptions. ' +
  'You never fabricate or exaggerate experience, and you answer with LaTeX only.';

export const COVER_LETTER_SYSTEM_PROMPT =
  'You are a professional cover letter writer who writes letters in LaTeX. You answer with LaTeX only.';

const LATEX_OUTPUT_FORMAT = [
  'Return only one complete LaTeX document, from \\documentclass to \\end{document},',
  'inside a single ```latex fenced block. No explanations or commentary outside it.',
  'The document must compile with pdflatex. Escape special characters such as %, &, $, # and _.'
].join('\n');

/**
 * Build a structured prompt with clear instructions
 */
export function buildStructuredPrompt(
  task: string,
  instructions: string[],
  inputs: PromptInput[] = [],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  if (inputs.length > 0) {
    prompt += 'INPUT DATA:\n\n';
    inputs.forEach(input => {
      prompt += `### ${input.label}\n${input.value}\n\n`;
    });
  }

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n`;
  }

  return prompt;
}

/**
 * Normalize line endings and surrounding whitespace of template text
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')  // Normalize line endings
    .replace(/\r/g, '\n')
    .trim();
}

function assertFilled(request: GenerationRequest): void {
  if (request.company.trim().length === 0) {
    throw ErrorHandler.createValidationError('Company name is required', 'company is empty', { field: 'company' });
  }
  if (request.jobDescription.trim().length === 0) {
    throw ErrorHandler.createValidationError('Job description is required', 'jobDescription is empty', {
      field: 'jobDescription'
    });
  }
}

function candidateInputs(templates: ResumeTemplates): PromptInput[] {
  const inputs: PromptInput[] = [
    { label: 'Current LaTeX resume', value: escapePromptText(templates.baseResume) }
  ];
  if (templates.profile) {
    inputs.push({ label: 'Candidate profile (JSON)', value: escapePromptText(templates.profile) });
  }
  return inputs;
}

/**
 * Prompt for a resume tailored to one company and job description
 */
export function composeResumePrompt(request: GenerationRequest, templates: ResumeTemplates): string {
  assertFilled(request);

  return buildStructuredPrompt(
    'Tailor the candidate\'s LaTeX resume to the job below.',
    [
      'Restructure and rephrase content from the current resume and the profile so it aligns with the job description.',
      'Keep the current resume\'s preamble, document class, section headers and overall layout.',
      'When the profile and the resume disagree, keep what is factually accurate.',
      'Identify the key skills and keywords of the job description and work them in naturally.',
      'Write experience and project bullet points in STAR form (situation, task, action, result).',
      'Do not invent experience, skills or numbers. Where the job asks for something the candidate lacks, highlight transferable skills instead.',
      'Prefer clarity and relevance over a strict page limit.'
    ],
    [
      { label: 'Company', value: request.company },
      { label: 'Job description', value: request.jobDescription },
      ...candidateInputs(templates)
    ],
    LATEX_OUTPUT_FORMAT
  );
}

/**
 * Prompt for a cover letter that accompanies an already generated resume
 */
export function composeCoverLetterPrompt(
  request: GenerationRequest,
  templates: ResumeTemplates,
  generatedResume: string
): string {
  assertFilled(request);

  return buildStructuredPrompt(
    'Write a cover letter in LaTeX for the candidate\'s application to the job below.',
    [
      'Express genuine enthusiasm for the role and the company.',
      'Highlight the experience and skills from the tailored resume that matter most for this job.',
      'Show an understanding of what the company needs.',
      'Open with "Dear Hiring Manager," and close with "Sincerely," followed by the candidate\'s name taken from the resume.',
      'End with a clear call to action.'
    ],
    [
      { label: 'Company', value: request.company },
      { label: 'Job description', value: request.jobDescription },
      ...candidateInputs(templates),
      { label: 'Tailored resume', value: escapePromptText(generatedResume) }
    ],
    LATEX_OUTPUT_FORMAT
  );
}

/**
 * Prompt asking the model to re-emit a reply that did not contain a usable document
 */
export function composeRepairPrompt(rawOutput: string): string {
  return buildStructuredPrompt(
    'The reply below was supposed to be a complete LaTeX document but could not be used as one.',
    [
      'Extract or reconstruct the LaTeX document it contains.',
      'Do not change its wording or structure beyond what is needed to make it a complete document.'
    ],
    [{ label: 'Reply', value: rawOutput }],
    LATEX_OUTPUT_FORMAT
  );
}
