import pinoHttp from 'pino-http';
import { createHttpLogger } from '@/adapters/logging/LoggerFactory';
import { ACTING_USER_HEADER } from '@/middlewares/authenticate';

/**
 * Routes that stream server-sent events stay open for minutes; logging
 * them on close adds nothing
 */
function isEventStream(url: string | undefined): boolean {
  return url?.split('?')[0]?.endsWith('/events') ?? false;
}

/**
 * One line per request, tagged with the acting user so admin actions can
 * be traced. 5xx log as error, 4xx as warn.
 */
export const requestLogger = pinoHttp({
  logger: createHttpLogger(),
  autoLogging: {
    ignore: (req) => isEventStream(req.url),
  },
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
  customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
  customErrorMessage: (req, res, err) =>
    `${req.method} ${req.url} ${res.statusCode}: ${err.message}`,
  serializers: {
    req: (req) => ({
      id: req.id,
      method: req.method,
      url: req.url,
      actingUserId: req.headers[ACTING_USER_HEADER],
      userAgent: req.headers['user-agent'],
      ip: req.remoteAddress,
    }),
    res: (res) => ({
      statusCode: res.statusCode,
    }),
  },
});
