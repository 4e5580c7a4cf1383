// @vitest-environment jsdom
/**
 * App tests: one generation round trip against a fetch fake
 */

import React from 'react';
import { describe, it, expect, afterEach } from 'vitest';
import { cleanup, fireEvent, render, screen } from '@testing-library/react';
import App from '../../renderer/App';
import { ApiClient, getOrCreateSessionId } from '../../renderer/lib/client';
import {
  COMPILATION_FAILURE,
  RECORD,
  SESSION,
  STATUS,
  SUCCESS,
  jsonResponse,
  metricsResponse,
  routingFetch
} from './fixtures';

afterEach(() => {
  cleanup();
  sessionStorage.clear();
});

/**
 * Fetch fake whose metrics grow by one record per generate call
 */
function serverFake(outcome: typeof SUCCESS | typeof COMPILATION_FAILURE, status = 200) {
  let generated = 0;
  const fetchImpl = routingFetch({
    '/api/status': () => jsonResponse(STATUS),
    '/api/metrics': () => jsonResponse(metricsResponse(generated > 0 ? [RECORD] : [])),
    '/api/generate': () => {
      generated++;
      return jsonResponse(outcome, status);
    }
  });
  return new ApiClient({ fetchImpl, sessionId: () => SESSION });
}

function fillAndSubmit() {
  fireEvent.change(screen.getByPlaceholderText('Enter the company name'), { target: { value: 'Acme' } });
  fireEvent.change(screen.getByPlaceholderText('Paste the job description'), {
    target: { value: 'Backend engineer' }
  });
  fireEvent.click(screen.getByRole('button', { name: 'Generate Resume' }));
}

describe('App', () => {
  it('should show the server status once loaded', async () => {
    render(<App client={serverFake(SUCCESS)} />);

    expect(await screen.findByText('openai · test-model · pdflatex')).toBeInTheDocument();
  });

  it('should show the generated resume with its token count', async () => {
    render(<App client={serverFake(SUCCESS)} />);

    fillAndSubmit();

    expect(await screen.findByText('Generated in 3.50s using 1,500 tokens (test-model).')).toBeInTheDocument();
    expect(screen.getByRole('link', { name: 'Download PDF' })).toHaveAttribute('download', 'acme-resume.pdf');
    expect(screen.queryByText('Cover Letter')).not.toBeInTheDocument();
  });

  it('should show the compiler log of a failed compilation', async () => {
    render(<App client={serverFake(COMPILATION_FAILURE, 422)} />);

    fillAndSubmit();

    expect(await screen.findByRole('heading', { name: 'Compilation failed' })).toBeInTheDocument();
    expect(screen.getByText('./resume.tex:3: Undefined control sequence.')).toBeInTheDocument();
  });

  it('should show metrics of the run when asked', async () => {
    render(<App client={serverFake(SUCCESS)} />);

    fillAndSubmit();
    await screen.findByText('Generated in 3.50s using 1,500 tokens (test-model).');
    fireEvent.click(screen.getByLabelText('Show metrics'));

    expect(screen.getByRole('heading', { name: 'Generation Metrics' })).toBeInTheDocument();
    expect(screen.getByText('Generation Time').nextElementSibling).toHaveTextContent('3.50s');
  });

  it('should clear the form and result on reset', async () => {
    render(<App client={serverFake(SUCCESS)} />);

    fillAndSubmit();
    await screen.findByText('Generated in 3.50s using 1,500 tokens (test-model).');
    fireEvent.click(screen.getByLabelText('Show metrics'));
    fireEvent.click(screen.getByRole('button', { name: 'Reset' }));

    expect(screen.getByText('Your generated resume will appear here.')).toBeInTheDocument();
    expect(screen.getByPlaceholderText('Enter the company name')).toHaveValue('');
    expect(screen.getByLabelText('Show metrics')).not.toBeChecked();
    expect(screen.queryByRole('heading', { name: 'Generation Metrics' })).not.toBeInTheDocument();
  });

  it('should report a request the server refused', async () => {
    const fetchImpl = routingFetch({
      '/api/status': () => jsonResponse(STATUS),
      '/api/metrics': () => jsonResponse(metricsResponse([])),
      '/api/generate': () => jsonResponse(
        { error: 'A generation is already running for this session', code: 'run_in_progress' },
        409
      )
    });
    render(<App client={new ApiClient({ fetchImpl, sessionId: () => SESSION })} />);

    fillAndSubmit();

    expect(await screen.findByText('A generation is already running for this session')).toBeInTheDocument();
  });
});

describe('getOrCreateSessionId', () => {
  it('should keep one id per tab in session storage', () => {
    const id = getOrCreateSessionId();

    expect(id).toMatch(/^[A-Za-z0-9_-]{8,128}$/);
    expect(getOrCreateSessionId()).toBe(id);
    expect(sessionStorage.getItem('resume-tailor.session-id')).toBe(id);
  });
});
