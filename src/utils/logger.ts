import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';
import type { EnvConfig } from '../types';

const { combine, timestamp, printf, errors } = winston.format;

type LogLevel = EnvConfig['LOG_LEVEL'];

interface LevelStyle {
  color: chalk.Chalk;
  brightColor: chalk.Chalk;
  icon: string;
}

// Color and icon per log level
const levelStyles: Record<LogLevel, LevelStyle> = {
  error: { color: chalk.red, brightColor: chalk.redBright, icon: '❌' },
  warn: { color: chalk.yellow, brightColor: chalk.yellowBright, icon: '⚠️ ' },
  info: { color: chalk.blue, brightColor: chalk.blueBright, icon: 'ℹ️ ' },
  http: { color: chalk.magenta, brightColor: chalk.magentaBright, icon: '🌐' },
  debug: { color: chalk.cyan, brightColor: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = {
  color: chalk.white,
  brightColor: chalk.whiteBright,
  icon: '📝',
};

const isLogLevel = (level: string): level is LogLevel => level in levelStyles;

const styleFor = (level: string): LevelStyle =>
  isLogLevel(level) ? levelStyles[level] : fallbackStyle;

// Run ids, row counts and the like travel as metadata
const formatMeta = (meta: Record<string, unknown>): string => {
  const { service: _service, ...rest } = meta;
  return Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
};

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const { color, brightColor, icon } = styleFor(level);

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  // Include stack trace for errors
  if (typeof stack === 'string') {
    return `${timestampStr} ${icon} ${levelStr}\n${chalk.red(stack)}`;
  }

  const text = typeof message === 'string' ? brightColor(message) : JSON.stringify(message);
  return `${timestampStr} ${icon} ${levelStr} ${text}${chalk.gray(formatMeta(meta))}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const body = typeof stack === 'string' ? stack : String(message);
  return `${String(ts)} [${level.toUpperCase()}]: ${body}${formatMeta(meta)}`;
});

const baseFormat = combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }));

// Create logger instance
const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'ledger-reconciliation' },
  transports: [
    // Console transport with colors
    new winston.transports.Console({
      format: combine(baseFormat, colorizedFormat),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: combine(baseFormat, fileFormat),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/reconciliation.log',
      format: combine(baseFormat, fileFormat),
    })
  );
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

// Static helpers for plain-message logging and startup banners
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  // Pretty formatted success message
  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Box-styled important message
  public static box = (title: string, message: string): void => {
    const line = '═'.repeat(50);
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╔${line}╗`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╠${line}╣`));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan('║') + chalk.white(` ${message.padEnd(49)}`) + chalk.cyan('║'));
    // eslint-disable-next-line no-console
    console.log(chalk.cyan(`╚${line}╝`));
  };
}

export default logger;
