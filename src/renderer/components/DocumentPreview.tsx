import React from 'react';
import type { DocumentPayload } from '../../shared/types/api';
import { documentFileName, pdfDataUrl, texDataUrl } from '../lib/format';

interface DocumentPreviewProps {
  title: string;
  company: string;
  document: DocumentPayload;
}

/**
 * Embedded PDF, download links and the LaTeX source of one generated document
 */
export function DocumentPreview({ title, company, document }: DocumentPreviewProps) {
  const pdfUrl = pdfDataUrl(document.pdfBase64);

  return (
    <section className="document-preview" aria-label={title}>
      <header className="document-header">
        <h2>{title}</h2>
        <div className="document-actions">
          <a className="btn" href={pdfUrl} download={documentFileName(company, document.kind, 'pdf')}>
            Download PDF
          </a>
          <a
            className="btn"
            href={texDataUrl(document.latexSource)}
            download={documentFileName(company, document.kind, 'tex')}
          >
            Download LaTeX
          </a>
        </div>
      </header>

      <iframe className="pdf-viewer" title={`${title} PDF`} src={pdfUrl} />

      <details className="latex-source">
        <summary>LaTeX source</summary>
        <pre>{document.latexSource}</pre>
      </details>
    </section>
  );
}
