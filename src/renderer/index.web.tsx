/**
 * Web Entry Point
 *
 * Mounts the React application. The API is served by the backend from the
 * same origin, or proxied to it by the Vite dev server.
 */

import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import './styles/index.css';

// Initialize the React application
const root = document.getElementById('root');

if (!root) {
  throw new Error(
    'Root element not found. Ensure index.html contains <div id="root"></div>'
  );
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
);
