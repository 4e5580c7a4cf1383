import React, { useCallback, useEffect, useState } from 'react';
import type { MetricsRecord } from '../shared/types';
import type {
  GenerateFailure,
  GenerateRequestBody,
  GenerateSuccess,
  StatusResponse
} from '../shared/types/api';
import { DocumentPreview } from './components/DocumentPreview';
import { FailurePanel } from './components/FailurePanel';
import { GenerateForm } from './components/GenerateForm';
import { MetricsPanel } from './components/MetricsPanel';
import { api as defaultApi, ApiClient } from './lib/client';
import { formatSeconds, formatTokens } from './lib/format';

interface AppProps {
  client?: ApiClient;
}

type RunView =
  | { kind: 'idle' }
  | { kind: 'running'; company: string }
  | { kind: 'succeeded'; company: string; outcome: GenerateSuccess }
  | { kind: 'failed'; company: string; outcome: GenerateFailure }
  | { kind: 'error'; message: string };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Root App component: the generation form, the result of the latest run
 * and the session's metrics.
 */
function App({ client = defaultApi }: AppProps) {
  const [run, setRun] = useState<RunView>({ kind: 'idle' });
  const [records, setRecords] = useState<MetricsRecord[]>([]);
  const [status, setStatus] = useState<StatusResponse | null>(null);
  const [showMetrics, setShowMetrics] = useState(false);
  // Remounts the form, clearing its fields
  const [formKey, setFormKey] = useState(0);

  const refreshMetrics = useCallback(async () => {
    try {
      const metrics = await client.getMetrics();
      setRecords(metrics.records);
    } catch (error) {
      console.warn('[App] Could not load metrics:', errorMessage(error));
    }
  }, [client]);

  useEffect(() => {
    void refreshMetrics();
    client.getStatus().then(setStatus, (error: unknown) => {
      console.warn('[App] Could not load server status:', errorMessage(error));
    });
  }, [client, refreshMetrics]);

  const handleSubmit = async (body: GenerateRequestBody) => {
    setRun({ kind: 'running', company: body.company });
    try {
      const outcome = await client.generate(body);
      setRun(outcome.success
        ? { kind: 'succeeded', company: body.company, outcome }
        : { kind: 'failed', company: body.company, outcome });
    } catch (error) {
      setRun({ kind: 'error', message: errorMessage(error) });
    }
    await refreshMetrics();
  };

  const handleReset = () => {
    setRun({ kind: 'idle' });
    setShowMetrics(false);
    setFormKey(key => key + 1);
  };

  const busy = run.kind === 'running';
  let currentRecord: MetricsRecord | undefined;
  if (run.kind === 'succeeded') {
    currentRecord = run.outcome.record;
  } else if (run.kind === 'failed') {
    currentRecord = run.outcome.record;
  }

  return (
    <div className="app">
      <nav className="nav-header">
        <div className="nav-container">
          <span className="nav-brand">
            <span className="nav-brand-icon">R</span>
            Resume Tailor
          </span>
          {status && (
            <span className="nav-status">
              {status.provider} · {status.model} · {status.compiler}
            </span>
          )}
          <button type="button" className="btn" onClick={handleReset} disabled={busy}>
            Reset
          </button>
        </div>
      </nav>

      <main className="main-content">
        <header className="dashboard-header">
          <h1 className="dashboard-title">Tailor your resume</h1>
          <p className="dashboard-subtitle">
            Paste a job description to generate a tailored LaTeX resume and an optional cover letter.
          </p>
        </header>

        <div className="dashboard-grid">
          <div className="dashboard-card">
            <GenerateForm
              key={formKey}
              busy={busy}
              maxCompanyLength={status?.limits.maxCompanyLength}
              maxJobDescriptionLength={status?.limits.maxJobDescriptionLength}
              onSubmit={body => void handleSubmit(body)}
            />
            <label className="field field-checkbox">
              <input
                type="checkbox"
                checked={showMetrics}
                onChange={event => setShowMetrics(event.target.checked)}
              />
              <span>Show metrics</span>
            </label>
          </div>

          <div className="dashboard-card result-card">
            {run.kind === 'idle' && (
              <p className="empty-state">Your generated resume will appear here.</p>
            )}
            {run.kind === 'running' && (
              <p className="status-message" role="status">Generating your resume for {run.company}…</p>
            )}
            {run.kind === 'error' && (
              <div className="failure-panel" role="alert">
                <h2>Request failed</h2>
                <p className="failure-message">{run.message}</p>
              </div>
            )}
            {run.kind === 'failed' && <FailurePanel failure={run.outcome} />}
            {run.kind === 'succeeded' && (
              <>
                <p className="status-message" role="status">
                  Generated in {formatSeconds(run.outcome.result.elapsedSeconds)} using{' '}
                  {formatTokens(run.outcome.result.tokensUsed)} tokens ({run.outcome.result.modelName}).
                </p>
                <DocumentPreview title="Resume" company={run.company} document={run.outcome.result.resume} />
                {run.outcome.result.coverLetter && (
                  <DocumentPreview
                    title="Cover Letter"
                    company={run.company}
                    document={run.outcome.result.coverLetter}
                  />
                )}
              </>
            )}
          </div>
        </div>

        {showMetrics && <MetricsPanel current={currentRecord} records={records} />}
      </main>
    </div>
  );
}

export default App;
