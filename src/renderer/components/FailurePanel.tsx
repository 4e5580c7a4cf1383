import React from 'react';
import type { GenerateFailure } from '../../shared/types/api';

const STAGE_TITLES: Record<GenerateFailure['stage'], string> = {
  validation: 'Please check your input',
  generation: 'Generation failed',
  compilation: 'Compilation failed'
};

interface FailurePanelProps {
  failure: GenerateFailure;
}

/**
 * A failed run: the cause, and for compilation failures the compiler log
 * and the generated LaTeX so the output can still be judged
 */
export function FailurePanel({ failure }: FailurePanelProps) {
  return (
    <section className="failure-panel" role="alert">
      <h2>{STAGE_TITLES[failure.stage]}</h2>
      <p className="failure-message">{failure.error}</p>
      {failure.suggestedAction && <p className="failure-action">{failure.suggestedAction}</p>}

      {failure.details && failure.details.length > 0 && (
        <ul className="failure-details">
          {failure.details.map((detail, index) => (
            <li key={`${detail.field}-${index}`}>{detail.message}</li>
          ))}
        </ul>
      )}

      {failure.compilerLog && (
        <details className="compiler-log" open>
          <summary>Compiler log{failure.document === 'cover-letter' ? ' (cover letter)' : ''}</summary>
          <pre>{failure.compilerLog}</pre>
        </details>
      )}

      {failure.latexSource && (
        <details className="latex-source">
          <summary>Generated resume LaTeX</summary>
          <pre>{failure.latexSource}</pre>
        </details>
      )}

      {failure.coverLetterSource && (
        <details className="latex-source">
          <summary>Generated cover letter LaTeX</summary>
          <pre>{failure.coverLetterSource}</pre>
        </details>
      )}
    </section>
  );
}
