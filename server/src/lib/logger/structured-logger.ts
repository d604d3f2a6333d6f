/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Daily rotated log files when LOG_TO_FILE=true
 * - Pretty console output in DEV
 * - Automatic secret redaction
 * - Request/turn tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

const streams: pino.StreamEntry[] = [];

if (config.console) {
  const consoleStream: pino.DestinationStream = config.pretty
    ? pinoPretty({
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
      })
    : process.stdout;
  streams.push({ level: config.level === 'silent' ? 'fatal' : config.level, stream: consoleStream });
}

if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: rfs.createStream('server.log', {
      interval: '1d',
      path: logsDir,
      maxFiles: config.rotateDays,
      compress: 'gzip',
    }),
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = typeof logger;
