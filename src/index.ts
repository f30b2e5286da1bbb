/**
 * Telemetry inference service entry point
 */

import dotenv from 'dotenv';
import { getConfigSummary, loadConfigFromEnv, validateConfig, type ServiceConfig } from './config';
import logger, { errorMeta } from './logging/logger';
import { LogComponents } from './logging/components';
import { MqttManager } from './mqtt/manager';
import { createComponents, createModelStore, stopPipeline } from './service';
import { MqttAlertPublisher } from './transport/mqtt-alert-publisher';
import { MqttReadingFeed } from './transport/mqtt-reading-feed';

dotenv.config();

function loadConfig(): ServiceConfig {
	const config = loadConfigFromEnv();
	const errors = validateConfig(config);
	if (errors.length > 0) {
		throw new Error(`Invalid configuration:\n  - ${errors.join('\n  - ')}`);
	}
	return config;
}

async function start(): Promise<void> {
	logger.info('Starting telemetry inference service', { component: LogComponents.SERVICE });

	const config = loadConfig();
	logger.info(getConfigSummary(config), { component: LogComponents.CONFIG });

	const store = createModelStore(config, logger);

	const mqtt = new MqttManager(logger);
	await mqtt.connect(config.mqtt.brokerUrl, {
		clientId: config.mqtt.clientId,
		username: config.mqtt.username,
		password: config.mqtt.password,
	});

	const publisher = new MqttAlertPublisher(mqtt, {
		topic: config.mqtt.alertTopic,
		queueWhenOffline: config.mqtt.queueAlertsWhenOffline,
	});
	const { engine } = createComponents(config, { publisher, store, logger });
	const feed = new MqttReadingFeed(mqtt, engine, config.mqtt.inputTopic, logger);
	await feed.start();

	logger.info('Telemetry inference service running', {
		component: LogComponents.SERVICE,
		inputTopic: config.mqtt.inputTopic,
		alertTopic: config.mqtt.alertTopic,
	});

	// Graceful shutdown
	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) return;
		shuttingDown = true;
		logger.info(`Received ${signal}, shutting down gracefully`, { component: LogComponents.SERVICE });

		try {
			await stopPipeline(feed, engine);
			await mqtt.disconnect();
			logger.info('Shutdown complete', { component: LogComponents.SERVICE, ...engine.getStats().metrics });
			process.exit(0);
		} catch (error) {
			logger.error('Shutdown failed', { component: LogComponents.SERVICE, ...errorMeta(error) });
			process.exit(1);
		}
	};

	process.on('SIGTERM', () => void shutdown('SIGTERM'));
	process.on('SIGINT', () => void shutdown('SIGINT'));
}

start().catch((error: unknown) => {
	logger.error('Failed to start service', { component: LogComponents.SERVICE, ...errorMeta(error) });
	process.exit(1);
});
