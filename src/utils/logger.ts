/**
 * Colored console logger for the run transcript
 */
import { getEnv } from '../config.js';

// ANSI color codes
const ansi = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Background colors
  bgBlue: '\x1b[44m',
};

type ColorName = keyof typeof ansi;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel | null = null;
let useColor: boolean | null = null;

// A bad environment is reported through this logger, so it cannot depend on one
function envSettings(): { level: LogLevel; color: boolean } {
  try {
    const env = getEnv();
    return { level: env.LOG_LEVEL, color: env.NO_COLOR === undefined };
  } catch {
    return { level: 'info', color: process.env.NO_COLOR === undefined };
  }
}

function threshold(): LogLevel {
  if (!minLevel) {
    minLevel = envSettings().level;
  }
  return minLevel;
}

function c(name: ColorName): string {
  if (useColor === null) {
    useColor = envSettings().color;
  }
  return useColor ? ansi[name] : '';
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[threshold()];
}

function timestamp(): string {
  return new Date().toLocaleTimeString();
}

function formatMessage(prefix: string, color: string, message: string): string {
  return `${c('dim')}[${timestamp()}]${c('reset')} ${color}${prefix}${c('reset')} ${message}`;
}

function print(level: LogLevel, formatted: string): void {
  if (!enabled(level)) return;
  if (level === 'error') {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    minLevel = level;
  },

  setColor(enabledColor: boolean): void {
    useColor = enabledColor;
  },

  info(message: string): void {
    print('info', formatMessage('INFO', c('blue'), message));
  },

  success(message: string): void {
    print('info', formatMessage('SUCCESS', c('green'), message));
  },

  warn(message: string): void {
    print('warn', formatMessage('WARN', c('yellow'), message));
  },

  error(message: string): void {
    print('error', formatMessage('ERROR', c('red'), message));
  },

  debug(message: string): void {
    print('debug', formatMessage('DEBUG', c('dim'), message));
  },

  // Something the bot is about to do in the browser
  action(message: string): void {
    print('info', formatMessage('BOT', c('cyan') + c('bright'), message));
  },

  job(message: string): void {
    print('info', formatMessage('JOB', c('magenta'), message));
  },

  // Needs the human at the keyboard
  prompt(message: string): void {
    print('warn', formatMessage('YOU', c('yellow') + c('bright'), message));
  },

  application(jobTitle: string, status: string): void {
    const statusColors: Record<string, ColorName> = {
      applying: 'yellow',
      submitted: 'green',
      closed: 'dim',
      timeout: 'red',
      skipped_no_easy_apply: 'dim',
      skipped_excluded: 'dim',
    };
    const statusText = status.toUpperCase().padEnd(8);
    print('info', formatMessage('APPLY', c(statusColors[status] ?? 'white'), `${statusText} ${jobTitle}`));
  },

  divider(title?: string): void {
    const line = '─'.repeat(50);
    if (title) {
      print('info', `\n${c('dim')}${line}${c('reset')}`);
      print('info', `${c('bright')}${c('cyan')}  ${title}${c('reset')}`);
      print('info', `${c('dim')}${line}${c('reset')}\n`);
    } else {
      print('info', `${c('dim')}${line}${c('reset')}`);
    }
  },

  summary(stats: {
    processed: number;
    skippedSeen: number;
    outcomes: Record<string, number>;
    storedByStatus: Record<string, number>;
  }): void {
    const stored = Object.values(stats.storedByStatus).reduce((sum, count) => sum + count, 0);
    const byName = (entries: Record<string, number>) => Object.entries(entries).sort(([a], [b]) => a.localeCompare(b));

    print('info', `\n${c('bgBlue')}${c('white')}${c('bright')} SUMMARY ${c('reset')}`);
    print('info', `${c('cyan')}  Processed this run:${c('reset')}   ${stats.processed}`);
    for (const [status, count] of byName(stats.outcomes)) {
      print('info', `${c('green')}    ${status.padEnd(22)}${c('reset')}${count}`);
    }
    print('info', `${c('cyan')}  Already handled:${c('reset')}      ${stats.skippedSeen}`);
    print('info', `${c('cyan')}  Jobs in state file:${c('reset')}   ${stored}`);
    for (const [status, count] of byName(stats.storedByStatus)) {
      print('info', `${c('dim')}    ${status.padEnd(22)}${count}${c('reset')}`);
    }
    print('info', '');
  },

  banner(): void {
    print('info', `
${c('cyan')}${c('bright')}
   ╔═══════════════════════════════════════════╗
   ║         Easy Apply Assistant v1.0         ║
   ║     It fills forms, you press Submit      ║
   ╚═══════════════════════════════════════════╝
${c('reset')}`);
  },
};
