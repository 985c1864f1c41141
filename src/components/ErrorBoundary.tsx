import React, { Component, ReactNode } from "react";
import { isMalformedMarkupError } from "@/errors";
import { debug } from "@/utils/debug";

interface Props {
  children: ReactNode;
  fallback?: (error: Error) => ReactNode;
}

interface State {
  error: Error | null;
}

function describeError(error: Error): string {
  if (isMalformedMarkupError(error)) {
    return `Malformed markup at offset ${error.offset}: ${error.input}`;
  }
  return error.message;
}

export class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    debug.error("ErrorBoundary caught an error:", error, {
      componentStack: errorInfo.componentStack,
    });
  }

  render() {
    const { error } = this.state;
    if (!error) {
      return this.props.children;
    }

    if (this.props.fallback) {
      return this.props.fallback(error);
    }

    return (
      <span role="alert" style={{ color: "#b91c1c", whiteSpace: "pre-wrap" }}>
        {describeError(error)}
      </span>
    );
  }
}
