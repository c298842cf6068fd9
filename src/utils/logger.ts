/**
 * Console levels, lowest first
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
}

export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

const RESET = '\x1b[0m';

type LevelStyle = {
  rank: number;
  emoji: string;
  color: string;
  stream: 'stdout' | 'stderr';
};

const STYLES: Record<LogLevel, LevelStyle> = {
  [LogLevel.DEBUG]: { rank: 0, emoji: '🔍', color: '\x1b[2m', stream: 'stdout' },
  [LogLevel.INFO]: { rank: 1, emoji: 'ℹ️', color: '\x1b[34m', stream: 'stdout' },
  [LogLevel.SUCCESS]: { rank: 2, emoji: '✅', color: '\x1b[32m', stream: 'stdout' },
  [LogLevel.WARNING]: { rank: 3, emoji: '⚠️', color: '\x1b[33m', stream: 'stdout' },
  [LogLevel.ERROR]: { rank: 4, emoji: '❌', color: '\x1b[31m', stream: 'stderr' },
  [LogLevel.HIGHLIGHT]: { rank: 5, emoji: '🌟', color: '\x1b[1m\x1b[35m', stream: 'stdout' },
};

const pad = (value: number): string => value.toString().padStart(2, '0');

/** MM-DD HH:mm:ss in local time */
const timestamp = (date: Date): string =>
  `${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

/**
 * Console logger for download progress
 *
 * Children share the config object of their parent, so `setLevel` on the root
 * also quiets every issue-scoped child.
 */
export class Logger {
  private config: LoggerConfig;
  private prefix?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? (process.stdout.isTTY === true && !process.env.NO_COLOR),
    };
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.write(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.write(LogLevel.WARNING, message);
  }

  /** Goes to stderr */
  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  /** Series headers and run summaries */
  highlight(message: string): void {
    this.write(LogLevel.HIGHLIGHT, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Logger that tags every line with `[prefix]`; nested prefixes are joined
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.config = this.config;
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }

  private write(level: LogLevel, message: string): void {
    const style = STYLES[level];
    if (style.rank < STYLES[this.config.level].rank) return;

    const text = this.config.useColors ? `${style.color}${message}${RESET}` : message;
    const tag = this.prefix ? `[${this.prefix}] ` : '';
    const line = `${timestamp(new Date())} ${style.emoji} ${tag}${text}`;

    if (style.stream === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export const logger: Logger = new Logger();
