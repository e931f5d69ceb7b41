// src/logger.ts

import {
  ModbusFunctionCode,
  MODBUS_EXCEPTION_MESSAGES,
} from './constants/constants.js';
import type { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/modbus-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'transactionId' | 'unitId' | 'funcCode' | 'exceptionCode' | 'peer';

const LOG_FIELDS: readonly LogField[] = [
  'timestamp',
  'level',
  'logger',
  'transactionId',
  'unitId',
  'funcCode',
  'exceptionCode',
  'peer',
];

// fields rendered in the header are not repeated in the JSON tail
const HEADER_KEYS = new Set<string>(LOG_FIELDS);

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logFormat: LogField[] = [...LOG_FIELDS];
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private static readonly FUNCTION_CODE_NAMES = new Map<number, string>([
    [ModbusFunctionCode.READ_COILS, 'READ_COILS'],
    [ModbusFunctionCode.READ_DISCRETE_INPUTS, 'READ_DISCRETE_INPUTS'],
    [ModbusFunctionCode.READ_HOLDING_REGISTERS, 'READ_HOLDING_REGISTERS'],
    [ModbusFunctionCode.READ_INPUT_REGISTERS, 'READ_INPUT_REGISTERS'],
    [ModbusFunctionCode.WRITE_SINGLE_COIL, 'WRITE_SINGLE_COIL'],
    [ModbusFunctionCode.WRITE_SINGLE_REGISTER, 'WRITE_SINGLE_REGISTER'],
    [ModbusFunctionCode.WRITE_MULTIPLE_COILS, 'WRITE_MULTIPLE_COILS'],
    [ModbusFunctionCode.WRITE_MULTIPLE_REGISTERS, 'WRITE_MULTIPLE_REGISTERS'],
  ]);

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Builds the printable line for a record: a bracketed header made of the
   * configured fields, the message arguments, then any remaining context as JSON.
   */
  format(level: LogLevel, args: unknown[], context: LogContext = {}): string {
    const merged: LogContext = { ...this.globalContext, ...context };
    const headerParts: string[] = [];

    for (const field of this.logFormat) {
      switch (field) {
        case 'timestamp':
          headerParts.push(`[${this.getTimestamp()}]`);
          break;
        case 'level':
          headerParts.push(`[${level.toUpperCase()}]`);
          break;
        case 'logger':
          if (merged.logger) headerParts.push(`[${merged.logger}]`);
          break;
        case 'transactionId':
          if (merged.transactionId != null) headerParts.push(`[T:${merged.transactionId}]`);
          break;
        case 'unitId':
          if (merged.unitId != null) headerParts.push(`[U:${merged.unitId}]`);
          break;
        case 'funcCode':
          if (merged.funcCode != null) {
            const name = Logger.FUNCTION_CODE_NAMES.get(merged.funcCode & 0x7f) ?? 'Unknown';
            headerParts.push(`[F:0x${merged.funcCode.toString(16).padStart(2, '0')}/${name}]`);
          }
          break;
        case 'exceptionCode':
          if (merged.exceptionCode != null) {
            const name = MODBUS_EXCEPTION_MESSAGES[merged.exceptionCode] ?? 'Unknown';
            headerParts.push(`[E:${merged.exceptionCode}/${name}]`);
          }
          break;
        case 'peer':
          if (merged.peer) headerParts.push(`[P:${merged.peer}]`);
          break;
      }
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    const rest: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!HEADER_KEYS.has(key) && value !== undefined) rest[key] = value;
    }
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [headerParts.join(''), ...formattedArgs].join(' ');
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    const categoryLevel = category ? this.categoryLevels[category] : undefined;
    if (categoryLevel === 'none') return false;
    const threshold = categoryLevel ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context: { ...this.globalContext, ...context } });
    }

    const line = this.format(level, args, context);
    const method = level === 'trace' ? 'debug' : level;
    if (this.useColors) {
      console[method](`${this.COLORS[level]}${line}${this.COLORS.reset}`);
    } else {
      console[method](line);
    }
  }

  /**
   * Treats a trailing plain object as the log context.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const split = this.splitArgsAndContext(args);
    const context = category ? { ...split.context, logger: category } : split.context;
    this.output(level, split.args, context);
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  enableColors(): void {
    this.useColors = true;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    if (!fields.every(f => LOG_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${LOG_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  /**
   * Creates a logger bound to a category.
   * @param name - Category name shown in the header and used by setLevelFor
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Error) &&
    !(value instanceof Uint8Array)
  );
}

/** Process-wide logger shared by every module category */
export const rootLogger = new Logger();

export default Logger;
