/**
 * Logging Component Names
 * 
 * Standardized component names for structured logging.
 * 
 * Usage:
 *   logger.info('Model admitted', { component: LogComponents.MODEL_CACHE });
 */

export const LogComponents = {
	// Process
	SERVICE: 'Service',
	CONFIG: 'Config',

	// Streaming core
	ENGINE: 'InferenceEngine',
	SLIDING_WINDOW: 'SlidingWindow',
	MODEL_CACHE: 'ModelCache',
	ALERT_EMITTER: 'AlertEmitter',

	// Model lifecycle
	MODEL_STORE: 'ModelStore',
	MODEL_BUILDER: 'ModelBuilder',
	TREND_API: 'TrendApi',
	TOKEN_MANAGER: 'TokenManager',

	// Transport
	MQTT: 'Mqtt',
	READING_FEED: 'ReadingFeed',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
