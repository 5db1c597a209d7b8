import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { MemoryLogger } from './memoryLogger';
import { TeeLogger } from './teeLogger';
export type { Logger, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export type { LogLevel, LoggedMessage } from './memoryLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, MemoryLogger, TeeLogger };
