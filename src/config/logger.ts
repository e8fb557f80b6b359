import pino from 'pino';
import type { DestinationStream } from 'pino';

function usePretty(env: NodeJS.ProcessEnv): boolean {
  return env.NODE_ENV !== 'test' && env.LOG_PRETTY !== 'false';
}

/**
 * Where JSON log lines go when pino-pretty is off. Always stderr, since
 * stdout carries command output such as the printed access token.
 */
export function logDestination(env: NodeJS.ProcessEnv = process.env): DestinationStream | undefined {
  return usePretty(env) ? undefined : pino.destination(2);
}

// Create logger instance with configuration
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  ...(usePretty(process.env) ? {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    },
  } : {}),
  // Redact credentials wherever they show up in log context
  redact: {
    paths: [
      'access_token',
      'refresh_token',
      'code_verifier',
      'accessToken',
      'refreshToken',
      'token.access_token',
      'token.refresh_token',
    ],
    remove: true,
  },
}, logDestination());

export default logger;
