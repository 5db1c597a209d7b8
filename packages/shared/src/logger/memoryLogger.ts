import type { PatchfixEvent } from '../types/events';
import { withPrefix } from './scope';
import type { Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggedMessage {
  level: LogLevel;
  message: string;
}

/**
 * Keeps events and messages in memory. Children share the parent's buffers.
 */
export class MemoryLogger implements Logger {
  readonly events: PatchfixEvent[];
  readonly messages: LoggedMessage[];

  constructor(
    private readonly bindings: Record<string, unknown> = {},
    buffers?: { events: PatchfixEvent[]; messages: LoggedMessage[] },
  ) {
    this.events = buffers?.events ?? [];
    this.messages = buffers?.messages ?? [];
  }

  log(event: PatchfixEvent): void {
    this.events.push(event);
  }

  trace(event: PatchfixEvent, message: string): void {
    this.events.push(event);
    this.push('info', message);
  }

  debug(message: string): void {
    this.push('debug', message);
  }

  info(message: string): void {
    this.push('info', message);
  }

  warn(message: string): void {
    this.push('warn', message);
  }

  error(error: Error, message?: string): void {
    this.push('error', message ? `${message}: ${error.message}` : error.message);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new MemoryLogger(
      { ...this.bindings, ...bindings },
      { events: this.events, messages: this.messages },
    );
  }

  /** Events of one type, narrowed to that type. */
  eventsOf<T extends PatchfixEvent['type']>(type: T): Extract<PatchfixEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<PatchfixEvent, { type: T }> => e.type === type);
  }

  private push(level: LogLevel, message: string): void {
    this.messages.push({ level, message: withPrefix(this.bindings, message) });
  }
}
