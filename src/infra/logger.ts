import pino from 'pino';
import { env } from './env';
import type { Logger } from '../core/ports';

// Pino logger instance configured for the engine
// name: identifies this logger in output
// level: LOG_LEVEL wins; otherwise production uses info, tests stay quiet, dev uses debug
// redact: strips free-text enquiry bodies, which may carry personal details
export const logger = pino({
  name: 'flat-allocation',
  level: env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : env.NODE_ENV === 'test' ? 'silent' : 'debug'),
  redact: {
    paths: ['query', 'answer', '*.query', '*.answer'],
    censor: '[redacted]',
  },
});

// Narrows a pino instance to the engine's Logger port
export function portLogger(log: pino.Logger = logger): Logger {
  return {
    info: (obj, msg) => log.info(obj, msg),
    warn: (obj, msg) => log.warn(obj, msg),
    error: (obj, msg) => log.error(obj, msg),
  };
}
