import pino from 'pino';
import pinoHttp from 'pino-http';
import env from '../config/env';

const logger = pino({ level: env.LOG_LEVEL });

/** Attaches `req.log`, a child of the root logger scoped to the request. */
export const requestLogger = pinoHttp({
  logger,
  serializers: { err: pino.stdSerializers.err },
});

export default logger;
