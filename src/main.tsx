import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App.tsx'
import DashboardErrorBoundary from './components/DashboardErrorBoundary'

function showFatal(message: string) {
  const root = document.getElementById('root')
  if (!root) return
  const pre = document.createElement('pre')
  pre.style.cssText = 'padding:16px;white-space:pre-wrap'
  pre.textContent = message
  root.replaceChildren(pre)
}

window.addEventListener('error', (e) => showFatal(String(e.error || e.message)))
window.addEventListener('unhandledrejection', (e) => showFatal(String(e.reason)))

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')

createRoot(container).render(
  <StrictMode>
    <DashboardErrorBoundary>
      <App />
    </DashboardErrorBoundary>
  </StrictMode>,
)
