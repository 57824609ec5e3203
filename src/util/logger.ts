// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
   return LEVEL_ORDER.some((level) => level === value);
}

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[news-scaffold]" or "[scaffolder]").
    */
   prefix?: string;
   /**
    * Force ANSI colors on or off. Defaults to TTY detection.
    */
   color?: boolean;
}

const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR === undefined;

type ColorFn = (text: string) => string;

function wrap(code: number, enabled: boolean): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (enabled ? `${open}${text}${close}` : text);
}

function palette(enabled: boolean) {
   return {
      red: wrap(31, enabled),
      yellow: wrap(33, enabled),
      cyan: wrap(36, enabled),
      magenta: wrap(35, enabled),
      dim: wrap(2, enabled),
      gray: wrap(90, enabled),
   };
}

type Palette = ReturnType<typeof palette>;

function colorForLevel(color: Palette, level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

/**
 * Leveled console logger with prefixes and colored output.
 */
export class Logger {
   private level: LogLevel;
   private readonly prefix: string | undefined;
   private readonly useColor: boolean;
   private readonly color: Palette;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
      this.useColor = options.color ?? supportsColor;
      this.color = palette(this.useColor);
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level;
   }

   /**
    * Create a child logger with an additional prefix.
    * The child takes a snapshot of the current level.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ level: this.level, prefix: combined, color: this.useColor });
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const levelColor = colorForLevel(this.color, lvl);
      const textColored = lvl === 'debug' ? this.color.dim(text) : levelColor(text);

      if (this.prefix) {
         return `${this.color.magenta(this.prefix)} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.level === 'silent') return false;
      return LEVEL_ORDER.indexOf(targetLevel) <= LEVEL_ORDER.indexOf(this.level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      console.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      console.log(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      console.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

const envLevel = process.env.NEWS_SCAFFOLD_LOG_LEVEL;

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via NEWS_SCAFFOLD_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: isLogLevel(envLevel) ? envLevel : 'info',
   prefix: '[news-scaffold]',
});
