import { Component, type ErrorInfo, type ReactNode } from "react";

interface Props {
  children: ReactNode;
}

interface State {
  hasError: boolean;
  error: Error | null;
}

/**
 * Catches render errors below it. Recovery resets the boundary instead of
 * reloading the page, since a reload would drop the session's holdings.
 */
export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false, error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    console.error("ErrorBoundary caught an error:", error, errorInfo);
  }

  private handleReset = () => {
    this.setState({ hasError: false, error: null });
  };

  render() {
    if (this.state.hasError) {
      return (
        <div className="flex items-center justify-center p-8">
          <div className="bg-rk-negative/10 border border-rk-negative/20 rounded-lg p-6 max-w-lg w-full">
            <h2 className="text-lg font-semibold text-rk-negative mb-2">
              Something went wrong
            </h2>
            <p className="text-sm text-rk-negative mb-4">
              {this.state.error?.message || "An unexpected error occurred."}
            </p>
            <p className="text-xs text-rk-text-tertiary mb-4">
              Your portfolio is still here. Try again to return to the page.
            </p>
            <button
              onClick={this.handleReset}
              className="px-4 py-2 bg-rk-negative text-rk-text-primary text-sm font-medium rounded-md hover:opacity-90 transition-colors"
            >
              Try again
            </button>
          </div>
        </div>
      );
    }

    return this.props.children;
  }
}
