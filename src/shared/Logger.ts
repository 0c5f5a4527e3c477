export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

/** 會被遮蔽的欄位名稱（不分大小寫） */
const SENSITIVE_KEYS = ['password', 'apikey', 'token', 'secret', 'credentials', 'username', 'authorization'];
const MASKED = '****';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVELS;
}

function resolveEnvLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** 遞迴遮蔽敏感欄位 */
export function redact(value: unknown, depth = 0): unknown {
  if (depth > 5 || value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map((v) => redact(v, depth + 1));
  return redactFields(value, depth);
}

function redactFields(value: object, depth = 0): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    out[key] = SENSITIVE_KEYS.includes(key.toLowerCase()) ? MASKED : redact(val, depth + 1);
  }
  return out;
}

/**
 * 結構化 JSON logger
 *
 * 一律寫到 stderr：stdio transport 下 stdout 是 MCP 協定通道。
 */
export class Logger {
  private static defaultLevel: LogLevel = resolveEnvLevel();

  /** 由 CLI 依設定調整全域最低等級 */
  static setDefaultLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
  }

  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? Logger.defaultLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...(data ? redactFields(data) : {}),
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel);
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
