import React, { useState } from 'react';
import type { GenerateRequestBody } from '../../shared/types/api';

interface GenerateFormProps {
  busy: boolean;
  maxCompanyLength?: number;
  maxJobDescriptionLength?: number;
  onSubmit: (body: GenerateRequestBody) => void;
}

/**
 * Company, job description and cover-letter choice.
 * Blank fields are caught here so no request is sent for them.
 */
export function GenerateForm({ busy, maxCompanyLength, maxJobDescriptionLength, onSubmit }: GenerateFormProps) {
  const [company, setCompany] = useState('');
  const [jobDescription, setJobDescription] = useState('');
  const [wantCoverLetter, setWantCoverLetter] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const handleSubmit = (event: React.FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    if (!company.trim()) {
      setError('Company name is required');
      return;
    }
    if (!jobDescription.trim()) {
      setError('Job description is required');
      return;
    }
    setError(null);
    onSubmit({ company, jobDescription, wantCoverLetter });
  };

  return (
    <form className="generate-form" onSubmit={handleSubmit} noValidate>
      <label className="field">
        <span className="field-label">Company Name</span>
        <input
          type="text"
          className="field-input"
          value={company}
          maxLength={maxCompanyLength}
          placeholder="Enter the company name"
          onChange={event => setCompany(event.target.value)}
          disabled={busy}
        />
      </label>

      <label className="field">
        <span className="field-label">Job Description</span>
        <textarea
          className="field-input field-textarea"
          value={jobDescription}
          maxLength={maxJobDescriptionLength}
          placeholder="Paste the job description"
          rows={12}
          onChange={event => setJobDescription(event.target.value)}
          disabled={busy}
        />
      </label>

      <label className="field field-checkbox">
        <input
          type="checkbox"
          checked={wantCoverLetter}
          onChange={event => setWantCoverLetter(event.target.checked)}
          disabled={busy}
        />
        <span>Generate a cover letter</span>
      </label>

      {error && <p className="form-error" role="alert">{error}</p>}

      <button type="submit" className="btn btn-primary" disabled={busy}>
        {busy ? 'Generating…' : 'Generate Resume'}
      </button>
    </form>
  );
}
