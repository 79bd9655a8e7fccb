import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { createStore } from './lib/store';
import { initialModel, update } from './lib/update';
import { createEffectRunner } from './lib/effects';

// Built once for the whole session; every state change goes through it.
const store = createStore({ init: initialModel, update, runEffect: createEffectRunner() });

const rootElement = document.getElementById('root');
if (!rootElement) throw new Error('Missing #root element');

createRoot(rootElement).render(
  <StrictMode>
    <App store={store} />
  </StrictMode>,
);
