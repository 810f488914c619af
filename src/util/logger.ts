// src/util/logger.ts

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
   return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Destination for formatted lines. Defaults to the console method
 * matching the level.
 */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string, rest: unknown[]) => void;

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[charm-compose]" or "[divert]").
    */
   prefix?: string;
   sink?: LogSink;
}

const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   green: wrap(32),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   bold: wrap(1),
   gray: wrap(90),
};

function colorForLevel(level: LogLevel): ColorFn {
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

const consoleSink: LogSink = (level, line, rest) => {
   switch (level) {
      case 'error':
         console.error(line, ...rest);
         break;
      case 'warn':
         console.warn(line, ...rest);
         break;
      case 'debug':
         console.debug(line, ...rest);
         break;
      default:
         console.log(line, ...rest);
   }
};

/**
 * Leveled console logger with colored output and prefix-composing children.
 *
 * Children share their parent's level: changing the level of the
 * process-wide logger (e.g. from `--debug`) affects every child created
 * from it, before or after the change.
 */
export class Logger {
   private level: LogLevel;
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;
   private readonly parent: Logger | undefined;

   constructor(options: LoggerOptions = {}, parent?: Logger) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
      this.parent = parent;
   }

   setLevel(level: LogLevel) {
      if (this.parent) {
         this.parent.setLevel(level);
         return;
      }
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.parent ? this.parent.getLevel() : this.level;
   }

   /**
    * Create a child logger with an additional prefix.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ prefix: combined, sink: this.sink }, this.parent ?? this);
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const levelColor = colorForLevel(lvl);
      const prefixColored = this.prefix
         ? color.magenta(this.prefix)
         : undefined;

      const textColored =
         lvl === 'debug' ? color.dim(text) : levelColor(text);

      if (prefixColored) {
         return `${prefixColored} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      const level = this.getLevel();
      if (level === 'silent') return false;
      return LOG_LEVELS.indexOf(targetLevel) <= LOG_LEVELS.indexOf(level);
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink('error', this.formatMessage(msg, 'error'), rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink('warn', this.formatMessage(msg, 'warn'), rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink('info', this.formatMessage(msg, 'info'), rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink('debug', this.formatMessage(msg, 'debug'), rest);
   }
}

const envLevel = process.env.CHARM_COMPOSE_LOG_LEVEL;

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via CHARM_COMPOSE_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: isLogLevel(envLevel) ? envLevel : 'info',
   prefix: '[charm-compose]',
});
