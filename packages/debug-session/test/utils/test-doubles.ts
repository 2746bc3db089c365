/**
 * Shared test doubles for debug-session tests
 */

import { PassThrough } from 'node:stream';
import { vi } from 'vitest';
import type { ILogger } from '@dap-gateway/core';
import type { DapRequest, DebuggeeAddress } from '@dap-gateway/models';
import {
  SessionConfigSchema,
  type SessionConfigInput,
  type SessionConfigZod,
} from '@dap-gateway/schemas';
import type {
  DebuggeeStartContext,
  EngineHooks,
  IProtocolEngine,
  OutboundEvent,
  OutboundResponse,
  SessionConnection,
} from '../../src/types/index.js';

export type RecordedLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecordedEntry {
  level: RecordedLevel;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Logger that keeps every entry for assertions
 */
export class RecordingLogger implements ILogger {
  public readonly entries: RecordedEntry[] = [];

  public debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  public error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  public messages(level: RecordedLevel): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}

/**
 * Engine that records what the session forwards to it
 */
export class FakeEngine implements IProtocolEngine {
  public readonly dispatched: DapRequest[] = [];
  public readonly responses: OutboundResponse[] = [];
  public readonly events: OutboundEvent[] = [];
  public runCalls = 0;
  private finish: () => void = () => undefined;
  private readonly finished = new Promise<void>((resolve) => {
    this.finish = resolve;
  });

  public constructor(public readonly hooks: EngineHooks) {}

  public run(): Promise<void> {
    this.runCalls++;
    return this.finished;
  }

  public stop(): void {
    this.finish();
  }

  public dispatchRequest(request: DapRequest): void {
    this.dispatched.push(request);
  }

  public sendResponse(response: OutboundResponse): void {
    this.responses.push(response);
  }

  public sendEvent(event: OutboundEvent): void {
    this.events.push(event);
  }
}

/**
 * Debuggee that runs until it is cancelled or told to finish
 */
export class DebuggeeStub {
  public context?: DebuggeeStartContext;
  public abortCount = 0;
  private resolveRun: () => void = () => undefined;

  public readonly starter = vi.fn(
    (context: DebuggeeStartContext): Promise<void> => {
      this.context = context;
      context.signal.addEventListener('abort', () => {
        this.abortCount++;
        this.resolveRun();
      });
      return new Promise<void>((resolve) => {
        this.resolveRun = resolve;
      });
    },
  );

  public finish(): void {
    this.resolveRun();
  }

  public startedContext(): DebuggeeStartContext {
    if (!this.context) {
      throw new Error('debuggee has not been started');
    }
    return this.context;
  }

  public resolveAddress(address: DebuggeeAddress): void {
    this.startedContext().logger.reportAddress(address);
  }
}

/**
 * In-memory connection; `close` is a spy
 */
export class StubConnection implements SessionConnection {
  public readonly input = new PassThrough();
  public readonly output = new PassThrough();
  public readonly close = vi.fn(() => {
    this.input.end();
    this.output.end();
  });
}

export function testConfig(overrides: SessionConfigInput = {}): SessionConfigZod {
  return SessionConfigSchema.parse(overrides);
}

export function request(
  seq: number,
  command: string,
  args?: Record<string, unknown>,
): DapRequest {
  return args === undefined
    ? { seq, type: 'request', command }
    : { seq, type: 'request', command, arguments: args };
}
