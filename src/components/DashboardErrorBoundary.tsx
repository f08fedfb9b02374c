import { Component } from 'react';
import type { ErrorInfo, ReactNode } from 'react';

interface Props {
  children: ReactNode;
}

interface State {
  message: string | null;
}

/** Message shown for a render failure; non-Error throws are stringified. */
export function describeRenderError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/** Render-failure fallback.  "Try again" remounts the dashboard, which reloads the catalog. */
export default class DashboardErrorBoundary extends Component<Props, State> {
  state: State = { message: null };

  static getDerivedStateFromError(error: unknown): State {
    return { message: describeRenderError(error) };
  }

  componentDidCatch(error: unknown, info: ErrorInfo) {
    console.error('[catalog] dashboard render failed', error, info.componentStack);
  }

  private retry = () => this.setState({ message: null });

  render() {
    const { message } = this.state;
    if (message === null) return this.props.children;

    return (
      <div className="page-container" role="alert">
        <h2 style={{ color: '#c53030', marginBottom: '0.5rem' }}>The dashboard stopped</h2>
        <p style={{ color: '#4a5568', marginBottom: '1rem' }}>
          Nothing was written to the catalog by this failure.
        </p>
        <pre className="json-view">{message}</pre>
        <div style={{ display: 'flex', gap: 8, marginTop: '1rem' }}>
          <button className="primary-btn" onClick={this.retry}>Try again</button>
          <button className="secondary-btn" onClick={() => window.location.reload()}>Reload page</button>
        </div>
      </div>
    );
  }
}
