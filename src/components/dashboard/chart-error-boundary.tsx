"use client";

import React from "react";
import { DataFallback } from "./data-fallback";
import type { ChartSpec } from "@/lib/types";

interface ChartErrorBoundaryProps {
  children: React.ReactNode;
  chart: ChartSpec;
}

interface ChartErrorBoundaryState {
  error: string | null;
}

/** Si Nivo revienta con un spec, se muestran sus filas en tabla. */
export class ChartErrorBoundary extends React.Component<ChartErrorBoundaryProps, ChartErrorBoundaryState> {
  state: ChartErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: unknown): ChartErrorBoundaryState {
    return { error: error instanceof Error && error.message ? error.message : "render error" };
  }

  componentDidCatch(error: Error) {
    console.error(`[chart:${this.props.chart.slot}]`, error.message);
  }

  componentDidUpdate(prev: ChartErrorBoundaryProps) {
    // Spec nuevo (cambio de filtros): volver a intentar el chart
    if (prev.chart !== this.props.chart && this.state.error !== null) {
      this.setState({ error: null });
    }
  }

  handleRetry = () => {
    this.setState({ error: null });
  };

  render() {
    if (this.state.error !== null) {
      return (
        <DataFallback
          chart={this.props.chart}
          reason={`failed to render (${this.state.error})`}
          onRetry={this.handleRetry}
        />
      );
    }
    return this.props.children;
  }
}
