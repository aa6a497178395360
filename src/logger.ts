// src/logger.ts

import { LogContext, LoggerInstance, LogLevel } from './types/mass-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'fn' | 'ref' | 'topic';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LogStats {
  byLevel: Record<LogLevel, number>;
  byFunction: Record<string, number>;
}

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private countsByFunction: Record<string, number> = {};
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'fn', 'ref', 'topic'];
  private mutedFunctions: Set<string> = new Set();
  private highlightRules: Array<Pick<LogContext, 'fn' | 'ref'>> = [];
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log line: coloured header fields first, then the arguments,
   * then whatever context is left over as JSON.
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color = this.useColors ? this.COLORS[level] : '';
    const reset = this.useColors ? this.COLORS.reset : '';
    const isHighlighted = this.highlightRules.some(
      rule => (!rule.fn || rule.fn === context.fn) && (!rule.ref || rule.ref === context.ref)
    );

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && context.logger) headerParts.push(`[${context.logger}]`);
    if (this.logFormat.includes('fn') && context.fn) headerParts.push(`[F:${context.fn}]`);
    if (this.logFormat.includes('ref') && context.ref) headerParts.push(`[R:${context.ref}]`);
    if (this.logFormat.includes('topic') && context.topic) headerParts.push(`[T:${context.topic}]`);

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    const contextToPrint: LogContext = { ...context };
    delete contextToPrint.logger;
    delete contextToPrint.fn;
    delete contextToPrint.ref;
    delete contextToPrint.topic;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    const highlight = this.useColors && isHighlighted ? this.COLORS.highlight : '';
    return [`${color}${highlight}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext): boolean {
    if (!this.enabled) return false;
    if (context.fn && this.mutedFunctions.has(context.fn)) return false;
    const category = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (category === 'none') return false;
    const threshold = category ?? this.currentLevel;
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    const merged: LogContext = { ...this.globalContext, ...context };
    if (!this.shouldLog(level, merged)) return;

    this.logCounts[level]++;
    if (merged.fn) this.countsByFunction[merged.fn] = (this.countsByFunction[merged.fn] ?? 0) + 1;

    this.watchCallback?.({ level, args, context: merged });

    const now = Date.now();
    if (now - this.lastLogTime < this.logRateLimit && level !== 'error' && level !== 'warn') return;
    this.lastLogTime = now;

    const formatted = this.format(level, args, merged);
    // console.trace would print a stack for every line
    const sink = level === 'trace' ? 'debug' : level;
    console[sink](...formatted);
  }

  /**
   * Splits a trailing plain object off the arguments and uses it as context.
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

  private log(level: LogLevel, args: unknown[], extra: LogContext = {}): void {
    const split = this.splitArgsAndContext(args);
    this.output(level, split.args, { ...split.context, ...extra });
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
    if (!this.LEVELS.includes(level)) throw new Error(`Unknown log level: ${level}`);
    this.currentLevel = level;
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

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = ['timestamp', 'level', 'logger', 'fn', 'ref', 'topic'];
    if (!fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = fields;
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  /** Suppresses every line logged for the given protocol function */
  mute(fn: string): void {
    this.mutedFunctions.add(fn);
  }

  unmute(fn: string): void {
    this.mutedFunctions.delete(fn);
  }

  highlight(rule: Pick<LogContext, 'fn' | 'ref'>): void {
    this.highlightRules.push({ fn: rule.fn, ref: rule.ref });
  }

  clearHighlights(): void {
    this.highlightRules = [];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getStats(): LogStats {
    return { byLevel: { ...this.logCounts }, byFunction: { ...this.countsByFunction } };
  }

  /**
   * Creates a named category logger bound to this instance.
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, { logger: name }),
      debug: (...args: unknown[]) => this.log('debug', args, { logger: name }),
      info: (...args: unknown[]) => this.log('info', args, { logger: name }),
      warn: (...args: unknown[]) => this.log('warn', args, { logger: name }),
      error: (...args: unknown[]) => this.log('error', args, { logger: name }),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error) return false;
  return Object.values(value).every(
    v => v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

export default Logger;
