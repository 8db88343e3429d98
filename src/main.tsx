import React from 'react';
import ReactDOM from 'react-dom/client';
import App from './App';
import { loadConfig } from './utils/config';

const root = document.getElementById('root');
if (!root) {
  throw new Error('Missing #root element');
}

const config = loadConfig();

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App config={config} />
  </React.StrictMode>,
);
