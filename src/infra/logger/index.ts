/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Where log lines are written.
 * The MCP stdio server owns stdout for protocol frames, so it logs to stderr.
 */
export type LogDestination = 'stdout' | 'stderr';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  destination?: LogDestination;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'commerce-insights-server',
  pretty: process.env['NODE_ENV'] !== 'production',
  destination: 'stdout',
};

const toFileDescriptor = (destination: LogDestination | undefined): 1 | 2 =>
  destination === 'stderr' ? 2 : 1;

/**
 * Builds the pino-pretty transport options shared by the standalone logger
 * and the Fastify logger.
 */
export const prettyTransport = (destination?: LogDestination) => ({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    destination: toFileDescriptor(destination),
  },
});

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  // Use pino-pretty in development for readable logs
  if (finalConfig.pretty === true) {
    options.transport = prettyTransport(finalConfig.destination);
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(toFileDescriptor(finalConfig.destination)));
};

export { type Logger } from 'pino';
