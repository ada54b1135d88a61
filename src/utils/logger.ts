import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logsDir = path.join(process.cwd(), 'logs');

try {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
} catch (error) {
  // If we can't create logs dir, just use console
  console.error('Failed to create logs directory:', error);
}

const logLevel = process.env.LOG_LEVEL || 'info';

// Credentials that can show up in engine output or request logs
const SECRET_PATTERNS = [
  // Authorization headers
  { pattern: /\b(Bearer)\s+[A-Za-z0-9\-._~+/]+=*/gi, replacement: '$1 [REDACTED_TOKEN]' },
  // key=value and "key": "value" pairs
  {
    pattern: /\b(token|api[_-]?key|secret|password|access[_-]?key)(["']?\s*[:=]\s*["']?)[^\s"'&,]+/gi,
    replacement: '$1$2[REDACTED_SECRET]'
  },
  // Hugging Face hub tokens used for model downloads
  { pattern: /\bhf_[A-Za-z0-9]{20,}\b/g, replacement: '[REDACTED_HF_TOKEN]' }
];

export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce((redacted, { pattern, replacement }) => redacted.replace(pattern, replacement), text);
}

/**
 * Redact secret-like values from every string field of a log entry
 */
export const redactFormat = winston.format(info => {
  for (const key of Object.keys(info)) {
    const value = info[key];
    if (typeof value === 'string') {
      info[key] = redactSecrets(value);
    }
  }
  return info;
});

const transports: winston.transport[] = [];

// Only add file transports if we can write to the logs directory
try {
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log')
    })
  );
} catch (error) {
  console.error('Failed to create file transports:', error);
}

if (process.env.NODE_ENV !== 'production') {
  transports.push(
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    redactFormat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'stem-sidecar' },
  transports,
  exitOnError: false
});

/**
 * Logger that tags every entry with the job it belongs to
 */
export function getJobLogger(jobId: string): winston.Logger {
  return logger.child({ jobId });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
