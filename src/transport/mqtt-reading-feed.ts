/**
 * Inbound reading feed: MQTT input topic -> inference engine
 */

import type { IClientSubscribeOptions } from 'mqtt';
import type { Logger } from '../logging/logger';
import defaultLogger, { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { IngestReport, InferenceEngine } from '../inference/engine';
import type { MessageHandler } from '../mqtt/manager';

/**
 * The part of MqttManager the feed needs
 */
export interface MqttSubscribeClient {
	subscribe(topic: string, options: IClientSubscribeOptions, handler: MessageHandler): Promise<void>;
}

export class MqttReadingFeed {
	private readonly mqtt: MqttSubscribeClient;
	private readonly engine: Pick<InferenceEngine, 'handleMessage'>;
	private readonly topic: string;
	private readonly logger: Logger;
	private readonly inFlight = new Set<Promise<IngestReport>>();
	private started = false;

	constructor(
		mqtt: MqttSubscribeClient,
		engine: Pick<InferenceEngine, 'handleMessage'>,
		topic: string,
		logger?: Logger
	) {
		this.mqtt = mqtt;
		this.engine = engine;
		this.topic = topic;
		this.logger = logger ?? defaultLogger;
	}

	async start(): Promise<void> {
		if (this.started) return;
		await this.mqtt.subscribe(this.topic, { qos: 1 }, (topic, payload) => this.onMessage(topic, payload));
		this.started = true;

		this.logger.info('Reading feed started', {
			component: LogComponents.READING_FEED,
			topic: this.topic,
		});
	}

	/**
	 * Stop handing messages to the engine and wait for those already handed over
	 */
	async stop(): Promise<void> {
		this.pause();
		await this.drain();
	}

	pause(): void {
		this.started = false;
	}

	/**
	 * Wait for messages already handed to the engine
	 */
	async drain(): Promise<void> {
		await Promise.allSettled(Array.from(this.inFlight));
	}

	getInFlightCount(): number {
		return this.inFlight.size;
	}

	private onMessage(topic: string, payload: Buffer): void {
		if (!this.started) return;

		const handled = this.engine.handleMessage(payload);
		this.inFlight.add(handled);
		void handled
			.catch((error: unknown) => {
				this.logger.error('Reading handler failed', {
					component: LogComponents.READING_FEED,
					topic,
					...errorMeta(error),
				});
			})
			.finally(() => this.inFlight.delete(handled));
	}
}
