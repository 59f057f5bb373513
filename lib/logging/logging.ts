import { randomUUID } from 'crypto';
import * as path from 'path';
import {
  ApiMetrics,
  ExecutionSummary,
  ExecutionTrace,
  LogLevel,
  PerformanceMetrics,
  TraceType,
} from './logging-types';
import { FileLogWriter, FileLogWriterImpl } from './file-log-writer';
import { ConsoleOutput, LogConfigManager } from './log-config';

export { LogLevel } from './logging-types';

// --- Structured workflow logging ---

export interface AIUsageData {
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
  provider: string;
  requestDuration: number;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  workflowId: string;
  stepNumber: number;
  functionName: string;
  message: string;
  metadata?: Record<string, unknown>;
  performanceMetrics?: {
    duration?: number;
    memoryUsage?: number;
    inputSize?: number;
    outputSize?: number;
  };
  aiUsage?: AIUsageData;
  sensitiveDataScrubbed: boolean;
  fileWriteStatus?: 'pending' | 'written' | 'failed';
}

export interface WorkflowLoggerConfig {
  enableFileLogging: boolean;
  logDirectory: string;
  logLevel: LogLevel;
  consoleOutput: ConsoleOutput;
  /** Used in the log file name instead of the workflow id. */
  documentId?: string;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.TRACE]: 0,
  [LogLevel.DEBUG]: 1,
  [LogLevel.STATE_TRANSITION]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.PERFORMANCE]: 2,
  [LogLevel.AI_USAGE]: 2,
  [LogLevel.WORKFLOW]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4,
};

const REDACTED_KEYS = ['password', 'token', 'apikey', 'api_key', 'authorization', 'secret'];

export class WorkflowLogger {
  private readonly workflowId: string;
  private readonly workflowStartTime: number;
  private workflowStepCounter = 0;
  private apiCallCounter = 0;
  private readonly executionTrace: ExecutionTrace[] = [];
  private readonly performanceMetrics = new PerformanceMetrics();
  private totalAiCost = 0;

  private fileWriter?: FileLogWriter;
  private fileLoggingEnabled: boolean;
  private fileReady?: Promise<void>;
  private readonly config: WorkflowLoggerConfig;

  constructor(initialWorkflowId?: string, config?: Partial<WorkflowLoggerConfig>) {
    this.workflowId = initialWorkflowId || randomUUID();
    this.workflowStartTime = Date.now();

    const globalConfig = LogConfigManager.getConfig();
    this.config = {
      enableFileLogging: config?.enableFileLogging ?? globalConfig.fileLoggingEnabled,
      logDirectory: config?.logDirectory ?? globalConfig.logDirectory,
      logLevel: config?.logLevel ?? globalConfig.logLevel,
      consoleOutput: config?.consoleOutput ?? globalConfig.consoleOutput,
      documentId: config?.documentId,
    };

    this.fileLoggingEnabled = this.config.enableFileLogging;
    if (this.fileLoggingEnabled) {
      this.fileReady = this.initializeFileLogging();
    }

    this.logTrace('WorkflowLogger.constructor', 'Initialized workflow logger', {
      workflowId: this.workflowId,
      fileLoggingEnabled: this.fileLoggingEnabled,
      logDirectory: this.config.logDirectory,
    });
  }

  public incrementStep(): number {
    return ++this.workflowStepCounter;
  }

  private createLogEntry(
    level: LogLevel,
    functionName: string,
    message: string,
    metadata?: Record<string, unknown>,
    performanceMetrics?: LogEntry['performanceMetrics'],
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      workflowId: this.workflowId,
      stepNumber: this.incrementStep(),
      functionName,
      message: scrubSensitiveText(message),
      metadata: metadata ? scrubRecord(metadata) : undefined,
      performanceMetrics,
      sensitiveDataScrubbed: true,
    };
  }

  private writeStructuredLog(entry: LogEntry): void {
    if (!this.shouldLogLevel(entry.level)) {
      return;
    }

    this.writeToConsole(entry);

    if (this.fileLoggingEnabled) {
      this.writeToFile(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    if (this.config.consoleOutput === 'none') {
      return;
    }

    const formattedMessage = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;
    const args: unknown[] = entry.metadata ? [formattedMessage, entry.metadata] : [formattedMessage];

    if (this.config.consoleOutput === 'stderr') {
      console.error(...args);
      return;
    }

    switch (entry.level) {
      case LogLevel.ERROR:
        console.error(...args);
        break;
      case LogLevel.WARN:
        console.warn(...args);
        break;
      case LogLevel.DEBUG:
      case LogLevel.TRACE:
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  }

  public logTrace(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.TRACE, functionName, message, metadata));
  }

  public logDebug(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.DEBUG, functionName, message, metadata));
  }

  public logInfo(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.INFO, functionName, message, metadata));
  }

  public logWarn(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.WARN, functionName, message, metadata));
  }

  public logError(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.ERROR, functionName, message, metadata));
  }

  public logWorkflow(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.WORKFLOW, functionName, message, metadata));
  }

  public logPerformance(
    functionName: string,
    message: string,
    metrics: LogEntry['performanceMetrics'],
  ): void {
    this.writeStructuredLog(
      this.createLogEntry(LogLevel.PERFORMANCE, functionName, message, undefined, metrics),
    );
  }

  public logAiUsage(functionName: string, aiUsage: AIUsageData): void {
    this.totalAiCost += aiUsage.totalCost;

    const entry = this.createLogEntry(
      LogLevel.AI_USAGE,
      functionName,
      `AI API call completed - Model: ${aiUsage.model}, Tokens: ${aiUsage.totalTokens}, Cost: $${aiUsage.totalCost.toFixed(4)}`,
      { ...aiUsage, cumulativeCost: this.totalAiCost },
    );
    entry.aiUsage = aiUsage;

    this.writeStructuredLog(entry);
  }

  /**
   * Records the start of an external call and returns its call id for
   * {@link logApiResponse}.
   */
  public logApiCall(service: string, method: string, input: unknown, startTime: number): string {
    const callId = `${this.workflowId}-api-${++this.apiCallCounter}`;
    this.writeStructuredLog(
      this.createLogEntry(LogLevel.DEBUG, `API.${service}.${method}.start`, 'Starting API call', {
        service,
        method,
        callId,
        input,
        startTime: new Date(startTime).toISOString(),
      }),
    );

    this.addToExecutionTrace('api_call_start', `${service}.${method}`, callId);
    return callId;
  }

  public logApiResponse(
    callId: string,
    service: string,
    method: string,
    response: unknown,
    error: unknown,
    executionTime: number,
  ): void {
    const failed = error !== undefined && error !== null;
    this.writeStructuredLog(
      this.createLogEntry(
        failed ? LogLevel.ERROR : LogLevel.DEBUG,
        `API.${service}.${method}.end`,
        `API call ${failed ? 'failed' : 'completed'}`,
        {
          service,
          method,
          callId,
          executionTime,
          success: !failed,
          response: failed ? undefined : response,
          error: failed ? describeError(error) : undefined,
        },
      ),
    );

    this.addToExecutionTrace('api_call_end', `${service}.${method}`, callId, {
      success: !failed,
      executionTime,
    });
  }

  public logStateTransition(fromState: string, toState: string, component: string, documentId: string): void {
    this.writeStructuredLog(
      this.createLogEntry(
        LogLevel.STATE_TRANSITION,
        `State.${component}`,
        `Document ${documentId}: ${fromState} -> ${toState}`,
        { documentId, fromState, toState },
      ),
    );

    this.addToExecutionTrace('state_transition', component, documentId, { fromState, toState });
  }

  public logStageStart(stage: string, metadata?: Record<string, unknown>): void {
    this.logWorkflow(`Stage.${stage}.start`, `Stage started: ${stage}`, metadata);
    this.addToExecutionTrace('stage_start', stage, undefined, metadata);
  }

  public logStageEnd(stage: string, success: boolean, executionTime: number, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(
      this.createLogEntry(
        success ? LogLevel.WORKFLOW : LogLevel.WARN,
        `Stage.${stage}.end`,
        `Stage ${success ? 'completed' : 'failed'}: ${stage}`,
        { ...metadata, success, executionTime },
      ),
    );
    this.addToExecutionTrace('stage_end', stage, undefined, { ...metadata, success, executionTime });
  }

  public logPerformanceMetrics(component: string, metrics: Record<string, number>): void {
    this.performanceMetrics.add(component, metrics);
    this.writeStructuredLog(
      this.createLogEntry(LogLevel.PERFORMANCE, `Performance.${component}`, 'Performance metrics recorded', {
        component,
        metrics,
        cumulativeMetrics: this.performanceMetrics.getCumulative(),
      }),
    );
  }

  public generateExecutionSummary(): ExecutionSummary {
    return {
      workflowId: this.workflowId,
      totalExecutionTime: Date.now() - this.workflowStartTime,
      totalSteps: this.workflowStepCounter,
      apiCalls: this.apiCallCounter,
      apiMetrics: this.calculateApiMetrics(),
      executionTrace: [...this.executionTrace],
      performanceMetrics: this.performanceMetrics.getAll(),
      totalAiCost: this.totalAiCost,
    };
  }

  /**
   * Flushes pending file writes and releases the log file.
   */
  public async close(): Promise<void> {
    if (this.fileReady) {
      await this.fileReady;
    }

    if (this.fileWriter) {
      await this.fileWriter.close();
      this.fileWriter = undefined;
    }
    this.fileLoggingEnabled = false;
  }

  private async initializeFileLogging(): Promise<void> {
    const writer = new FileLogWriterImpl();
    const initialized = await writer.initialize(this.generateLogFilePath());
    if (initialized) {
      this.fileWriter = writer;
    } else {
      this.fileLoggingEnabled = false;
      console.warn('[WorkflowLogger] File logging initialization failed, falling back to console only');
    }
  }

  private generateLogFilePath(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').replace('Z', '');
    const name = sanitizeFileName(this.config.documentId || this.workflowId);
    const baseLogDir = this.config.logDirectory || path.join(process.cwd(), 'logs');

    return path.join(baseLogDir, `workflow-${timestamp}-${name}.log`);
  }

  private shouldLogLevel(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.config.logLevel];
  }

  private writeToFile(entry: LogEntry): void {
    const ready = this.fileReady ?? Promise.resolve();
    entry.fileWriteStatus = 'pending';

    ready
      .then(async () => {
        if (!this.fileWriter) {
          entry.fileWriteStatus = 'failed';
          return;
        }
        await this.fileWriter.writeEntry(entry);
        entry.fileWriteStatus = 'written';
      })
      .catch((error: unknown) => {
        // Console only: routing this through writeStructuredLog could recurse.
        entry.fileWriteStatus = 'failed';
        console.warn(`[WorkflowLogger] File write failed: ${describeError(error).message}`);
      });
  }

  private addToExecutionTrace(
    type: TraceType,
    component: string,
    stepId?: string,
    metadata?: Record<string, unknown>,
  ): void {
    const success = metadata?.success;
    this.executionTrace.push({
      type,
      component,
      stepId,
      timestamp: Date.now(),
      metadata,
      success: typeof success === 'boolean' ? success : undefined,
    });
  }

  private calculateApiMetrics(): ApiMetrics {
    const apiCalls = this.executionTrace.filter((t) => t.type === 'api_call_end');
    if (apiCalls.length === 0) {
      return { totalCalls: 0, successfulCalls: 0, failedCalls: 0, averageExecutionTime: 0 };
    }

    const totalTime = apiCalls.reduce((sum, t) => {
      const executionTime = t.metadata?.executionTime;
      return sum + (typeof executionTime === 'number' ? executionTime : 0);
    }, 0);

    return {
      totalCalls: apiCalls.length,
      successfulCalls: apiCalls.filter((t) => t.success).length,
      failedCalls: apiCalls.filter((t) => !t.success).length,
      averageExecutionTime: totalTime / apiCalls.length,
    };
  }
}

// --- Sanitization helpers ---

export function scrubSensitiveText(text: string): string {
  return text
    .replace(/\b\d{3}-\d{2}-\d{4}\b/g, '[SSN-REDACTED]')
    .replace(/\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/g, '[CARD-REDACTED]')
    .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, '[EMAIL-REDACTED]')
    .replace(/\b\d{10,}\b/g, '[PHONE-REDACTED]');
}

function scrubRecord(record: Record<string, unknown>): Record<string, unknown> {
  const scrubbed = scrubValue(record, new WeakSet());
  return isRecord(scrubbed) ? scrubbed : { value: scrubbed };
}

function scrubValue(value: unknown, visited: WeakSet<object>): unknown {
  if (typeof value === 'string') {
    return scrubSensitiveText(value);
  }
  if (value instanceof Error) {
    return scrubValue(describeError(value), visited);
  }
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (visited.has(value)) {
    return '[CIRCULAR-REFERENCE]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubValue(item, visited));
  }

  const scrubbed: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    scrubbed[key] = REDACTED_KEYS.includes(lowerKey)
      ? '[REDACTED]'
      : scrubValue(item, visited);
  }
  return scrubbed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeFileName(fileName: string): string {
  return fileName.replace(/[^a-zA-Z0-9\-_]/g, '-').substring(0, 50);
}

/**
 * Reduces any thrown value to a plain, loggable shape.
 */
export function describeError(error: unknown): { name: string; message: string; code?: string } {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, code };
  }
  return { name: 'UnknownError', message: String(error) };
}
