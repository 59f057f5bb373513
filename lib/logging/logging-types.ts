// Log levels for structured logging
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  PERFORMANCE = 'PERFORMANCE',
  STATE_TRANSITION = 'STATE_TRANSITION',
  AI_USAGE = 'AI_USAGE',
  WORKFLOW = 'WORKFLOW',
}

export type TraceType =
  | 'stage_start'
  | 'stage_end'
  | 'api_call_start'
  | 'api_call_end'
  | 'state_transition';

export interface ExecutionTrace {
  type: TraceType;
  component: string;
  stepId?: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
  success?: boolean;
}

export interface ApiMetrics {
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  averageExecutionTime: number;
}

export interface ExecutionSummary {
  workflowId: string;
  totalExecutionTime: number;
  totalSteps: number;
  apiCalls: number;
  apiMetrics: ApiMetrics;
  executionTrace: ExecutionTrace[];
  performanceMetrics: Record<string, Record<string, number>[]>;
  totalAiCost: number;
}

export interface IPerformanceMetrics {
  add(component: string, metrics: Record<string, number>): void;
  getCumulative(): Record<string, number>;
  getAll(): Record<string, Record<string, number>[]>;
}

export class PerformanceMetrics implements IPerformanceMetrics {
  private metrics: Map<string, Record<string, number>[]> = new Map();
  private cumulative: Record<string, number> = {};

  add(component: string, metrics: Record<string, number>): void {
    const existing = this.metrics.get(component) ?? [];
    existing.push(metrics);
    this.metrics.set(component, existing);

    for (const [key, value] of Object.entries(metrics)) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        this.cumulative[key] = (this.cumulative[key] ?? 0) + value;
      }
    }
  }

  getCumulative(): Record<string, number> {
    return { ...this.cumulative };
  }

  getAll(): Record<string, Record<string, number>[]> {
    const allMetrics: Record<string, Record<string, number>[]> = {};
    for (const [key, value] of this.metrics.entries()) {
      allMetrics[key] = [...value];
    }
    return allMetrics;
  }
}
