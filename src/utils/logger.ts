import winston from 'winston';
import chalk, { Chalk } from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'debug';

interface LevelStyle {
  label: Chalk;
  text: Chalk;
  icon: string;
}

const styles: Record<LogLevel, LevelStyle> = {
  error: { label: chalk.red, text: chalk.redBright, icon: '❌' },
  warn: { label: chalk.yellow, text: chalk.yellowBright, icon: '⚠️ ' },
  info: { label: chalk.blue, text: chalk.blueBright, icon: 'ℹ️ ' },
  http: { label: chalk.magenta, text: chalk.magentaBright, icon: '🌐' },
  debug: { label: chalk.cyan, text: chalk.cyanBright, icon: '🔍' },
};

const fallbackStyle: LevelStyle = { label: chalk.white, text: chalk.whiteBright, icon: '📝' };

const isLogLevel = (level: string): level is LogLevel => level in styles;

const styleFor = (level: string): LevelStyle => (isLogLevel(level) ? styles[level] : fallbackStyle);

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Every transport stamps the time and unwraps Error stacks before rendering
const withBase = (render: winston.Logform.Format): winston.Logform.Format =>
  combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), render);

const consoleLine = printf(({ level, message, timestamp: ts, stack }) => {
  const style = styleFor(level);
  const head = `${chalk.gray(`[${String(ts)}]`)} ${style.icon} ${style.label(`[${level.toUpperCase()}]`)}`;

  if (stack) {
    return `${head}\n${chalk.red(String(stack))}`;
  }
  return `${head} ${typeof message === 'string' ? style.text(message) : String(message)}`;
});

const plainLine = printf(
  ({ level, message, timestamp: ts, stack }) =>
    `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`
);

const fileTransports = (): winston.transport[] => [
  new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: withBase(plainLine) }),
  new winston.transports.File({ filename: 'logs/combined.log', format: withBase(plainLine) }),
];

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: 'intercompany-reconciliation' },
  transports: [
    new winston.transports.Console({ format: withBase(consoleLine) }),
    ...(env.NODE_ENV === 'production' ? fileTransports() : []),
  ],
});

/**
 * Startup output that bypasses the level filter
 */
export class Logging {
  public static success = (message: string): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(message));
  };

  public static box = (title: string, ...lines: string[]): void => {
    const width = 50;
    const border = '═'.repeat(width);
    const row = (text: string, paint: Chalk): string =>
      chalk.cyan('║') + paint(` ${text}`.padEnd(width)) + chalk.cyan('║');

    const output = [
      chalk.cyan(`╔${border}╗`),
      row(title, chalk.bold.cyanBright),
      chalk.cyan(`╠${border}╣`),
      ...lines.map((line) => row(line, chalk.white)),
      chalk.cyan(`╚${border}╝`),
    ];
    // eslint-disable-next-line no-console
    console.log(output.join('\n'));
  };
}

export default logger;
