import { types } from 'util';
import winston from 'winston';

// configより先に読み込まれるため、環境変数を直接参照する
const logLevel = process.env.LOG_LEVEL || 'info';

// メタデータ内のErrorはJSON.stringifyで {} になるため展開する
function serializeMeta(_key: string, value: unknown): unknown {
  if (types.isNativeError(value)) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

const logger = winston.createLogger({
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const rest =
        Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, serializeMeta)}` : '';
      return `${timestamp} [${level}] ${message}${rest}`;
    })
  ),
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

export default logger;
