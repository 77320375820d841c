import type { BaseLogger } from 'pino';

/** Log methods the use cases call; met by pino loggers and Fastify's `request.log`. */
export type UseCaseLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
