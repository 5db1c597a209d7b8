import type { PatchfixEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Fans structured events out to several loggers; leveled messages go to the
 * first one only so the console does not print them twice.
 */
export class TeeLogger implements Logger {
  constructor(private readonly loggers: [Logger, ...Logger[]]) {}

  async log(event: PatchfixEvent): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.log(event)));
  }

  async trace(event: PatchfixEvent, message: string): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.trace(event, message)));
  }

  debug(message: string) {
    return this.loggers[0].debug(message);
  }

  info(message: string) {
    return this.loggers[0].info(message);
  }

  warn(message: string) {
    return this.loggers[0].warn(message);
  }

  error(error: Error, message?: string) {
    return this.loggers[0].error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    const [first, ...rest] = this.loggers;
    return new TeeLogger([first.child(bindings), ...rest.map((l) => l.child(bindings))]);
  }
}
