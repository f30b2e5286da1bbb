/**
 * General Purpose Logger
 * Wrapper around Winston for service logging
 */

import winston from 'winston';

const SERVICE_NAME = 'telemetry-inference';

const logger = winston.createLogger({
	level: process.env.LOG_LEVEL || 'info',
	silent: process.env.NODE_ENV === 'test',
	format: winston.format.combine(
		winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: SERVICE_NAME },
	transports: [],
});

if (process.env.NODE_ENV === 'production') {
	logger.add(new winston.transports.Console());
} else {
	logger.add(new winston.transports.Console({
		format: winston.format.combine(
			winston.format.colorize(),
			winston.format.timestamp({ format: 'HH:mm:ss' }),
			winston.format.printf(({ timestamp, level, message, service, component, ...meta }) => {
				const prefix = component ? `[${String(component)}] ` : '';
				const metaStr = Object.keys(meta).length > 0
					? ' ' + JSON.stringify(meta)
					: '';
				return `${timestamp} [${level}]: ${prefix}${message}${metaStr}`;
			})
		),
	}));
}

/**
 * Flatten an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return { error: error.message, errorName: error.name, stack: error.stack };
	}
	return { error: String(error) };
}

export type Logger = winston.Logger;

export default logger;

export { logger };
