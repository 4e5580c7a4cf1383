/**
 * Candidate templates - the base LaTeX resume and the optional profile JSON,
 * read once at startup.
 */

import * as fs from 'fs';
import { looksLikeLatexDocument, type ResumeTemplates } from '../../shared/llm';
import { ConfigurationError, type TemplatesConfig } from '../config';

export function loadTemplates(config: TemplatesConfig): ResumeTemplates {
  const problems: string[] = [];

  let baseResume = '';
  if (!fs.existsSync(config.baseResumePath)) {
    problems.push(`Base resume not found at ${config.baseResumePath}. Set BASE_RESUME_PATH.`);
  } else {
    baseResume = fs.readFileSync(config.baseResumePath, 'utf-8');
    if (!looksLikeLatexDocument(baseResume)) {
      problems.push(
        `Base resume at ${config.baseResumePath} is not a complete LaTeX document ` +
        '(needs \\documentclass, \\begin{document} and \\end{document}).'
      );
    }
  }

  let profile: string | undefined;
  if (config.profilePath && fs.existsSync(config.profilePath)) {
    const raw = fs.readFileSync(config.profilePath, 'utf-8');
    try {
      profile = JSON.stringify(JSON.parse(raw), null, 2);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`Profile at ${config.profilePath} is not valid JSON: ${reason}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return { baseResume, profile };
}
