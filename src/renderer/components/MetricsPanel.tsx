import React from 'react';
import { Bar, BarChart, CartesianGrid, Line, LineChart, Tooltip, XAxis, YAxis } from 'recharts';
import type { MetricsRecord } from '../../shared/types';
import { formatSeconds, formatStatus, formatTime, formatTokens } from '../lib/format';

const CHART_WIDTH = 560;
const CHART_HEIGHT = 260;

interface MetricsPanelProps {
  /** Record of the run shown in the result view, if any */
  current?: MetricsRecord;
  /** Session history, oldest first */
  records: MetricsRecord[];
}

function CurrentRun({ record }: { record: MetricsRecord }) {
  const tokenData = [
    { category: 'Prompt Tokens', count: record.promptTokens },
    { category: 'Completion Tokens', count: record.completionTokens }
  ];

  return (
    <div className="metrics-current">
      <dl className="metrics-grid">
        <div><dt>Generation Time</dt><dd>{formatSeconds(record.elapsedSeconds)}</dd></div>
        <div><dt>Total Tokens</dt><dd>{formatTokens(record.tokensUsed)}</dd></div>
        <div><dt>Prompt Tokens</dt><dd>{formatTokens(record.promptTokens)}</dd></div>
        <div><dt>Completion Tokens</dt><dd>{formatTokens(record.completionTokens)}</dd></div>
        <div><dt>Model</dt><dd>{record.modelName}</dd></div>
        <div><dt>Status</dt><dd>{formatStatus(record.status)}</dd></div>
      </dl>

      <h4>Token Usage Breakdown</h4>
      <BarChart width={CHART_WIDTH} height={CHART_HEIGHT} data={tokenData}>
        <CartesianGrid vertical={false} />
        <XAxis dataKey="category" />
        <YAxis allowDecimals={false} width={56} />
        <Tooltip />
        <Bar dataKey="count" name="Tokens" fill="#3498db" />
      </BarChart>
    </div>
  );
}

function History({ records }: { records: MetricsRecord[] }) {
  const series = records.map(record => ({
    time: formatTime(record.timestamp),
    tokens: record.tokensUsed,
    seconds: Number(record.elapsedSeconds.toFixed(2))
  }));

  return (
    <div className="metrics-history">
      <h4>Token Usage Over Time</h4>
      <LineChart width={CHART_WIDTH} height={CHART_HEIGHT} data={series}>
        <CartesianGrid vertical={false} />
        <XAxis dataKey="time" tickMargin={8} />
        <YAxis width={56} />
        <Tooltip />
        <Line type="monotone" dataKey="tokens" name="Total Tokens" stroke="#3498db" strokeWidth={2} />
      </LineChart>

      <h4>Generation Time Over Time</h4>
      <LineChart width={CHART_WIDTH} height={CHART_HEIGHT} data={series}>
        <CartesianGrid vertical={false} />
        <XAxis dataKey="time" tickMargin={8} />
        <YAxis width={56} />
        <Tooltip />
        <Line type="monotone" dataKey="seconds" name="Generation Time (s)" stroke="#2ecc71" strokeWidth={2} />
      </LineChart>

      <details className="metrics-raw">
        <summary>View Raw Metrics Data</summary>
        <table className="metrics-table">
          <thead>
            <tr>
              <th>Time</th>
              <th>Company</th>
              <th>Model</th>
              <th>Tokens</th>
              <th>Elapsed</th>
              <th>Cover Letter</th>
              <th>Status</th>
            </tr>
          </thead>
          <tbody>
            {records.map(record => (
              <tr key={record.id}>
                <td>{formatTime(record.timestamp)}</td>
                <td>{record.company}</td>
                <td>{record.modelName}</td>
                <td>{formatTokens(record.tokensUsed)}</td>
                <td>{formatSeconds(record.elapsedSeconds)}</td>
                <td>{record.coverLetter ? 'Yes' : 'No'}</td>
                <td>{formatStatus(record.status)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </details>
    </div>
  );
}

/**
 * Current generation stats and the session's history as charts and a table
 */
export function MetricsPanel({ current, records }: MetricsPanelProps) {
  return (
    <section className="metrics-panel" aria-label="Metrics">
      <h3>Generation Metrics</h3>
      {current
        ? <CurrentRun record={current} />
        : <p className="empty-state">No metrics available for the current generation</p>}

      <h3>Historical Performance</h3>
      {records.length > 0
        ? <History records={records} />
        : <p className="empty-state">No historical metrics available yet</p>}
    </section>
  );
}
