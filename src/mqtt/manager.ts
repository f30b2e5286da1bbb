import mqtt, { type MqttClient, type IClientOptions, type IClientPublishOptions, type IClientSubscribeOptions } from 'mqtt';
import { EventEmitter } from 'events';
import type { Logger } from '../logging/logger';
import defaultLogger, { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';

export type MessageHandler = (topic: string, payload: Buffer) => void;

/**
 * Subscription handler entry
 * Supports multiple subscriptions to same or overlapping patterns
 */
type SubscriptionHandler = {
	pattern: string;
	handler: MessageHandler;
};

type PendingPublish = {
	topic: string;
	payload: string | Buffer;
	options?: IClientPublishOptions;
};

/**
 * Check if a topic matches a subscription pattern (supports + and # wildcards)
 */
export function topicMatches(pattern: string, topic: string): boolean {
	// Shared subscriptions deliver the plain topic
	const plain = pattern.startsWith('$share/') ? pattern.split('/').slice(2).join('/') : pattern;
	const patternParts = plain.split('/');
	const topicParts = topic.split('/');

	for (let i = 0; i < patternParts.length; i++) {
		if (patternParts[i] === '#') {
			return true; // Multi-level wildcard matches everything after
		}
		if (i >= topicParts.length) {
			return false;
		}
		if (patternParts[i] === '+') {
			continue; // Single-level wildcard matches any value at this level
		}
		if (patternParts[i] !== topicParts[i]) {
			return false;
		}
	}

	return patternParts.length === topicParts.length;
}

/**
 * MQTT connection manager
 *
 * One connection for the reading feed and the alert publisher. Reconnects
 * with exponential backoff; queued publishes are drained on reconnect.
 *
 * Events:
 * - 'connect': Emitted when MQTT connection is established
 */
export class MqttManager extends EventEmitter {
	private client: MqttClient | null = null;
	private connected = false;
	private stopping = false;
	private subscriptionHandlers: SubscriptionHandler[] = [];
	private connectionPromise: Promise<void> | null = null;
	private logger: Logger;
	private pendingPublishes: PendingPublish[] = [];
	private readonly MAX_PENDING_PUBLISHES = 1000; // Prevent memory overflow
	private readonly PUBLISH_TIMEOUT_MS = 5000;
	private reconnectAttempts = 0;
	private reconnectTimer?: NodeJS.Timeout;
	private readonly MAX_RECONNECT_DELAY_MS = 30000; // 30 seconds max
	private readonly BASE_RECONNECT_DELAY_MS = 1000; // 1 second base

	constructor(logger?: Logger) {
		super();
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * Connect to MQTT broker (idempotent - can be called multiple times)
	 */
	public async connect(brokerUrl: string, options?: IClientOptions): Promise<void> {
		this.stopping = false;

		if (this.client && this.connected) {
			return;
		}

		// If connection in progress, wait for it
		if (this.connectionPromise) {
			return this.connectionPromise;
		}

		// Clean up old client if exists (prevent listener leaks on reconnection)
		if (this.client) {
			this.client.removeAllListeners();
			this.client.end(true);
			this.client = null;
		}

		this.logger.info('Connecting to MQTT broker', {
			component: LogComponents.MQTT,
			brokerUrl,
		});

		this.connectionPromise = new Promise((resolve, reject) => {
			const client = mqtt.connect(brokerUrl, {
				...options,
				clean: true,
				reconnectPeriod: 0, // Disable auto-reconnect, we'll handle it manually
				connectTimeout: 10000,
			});
			this.client = client;

			const connectionTimeout = setTimeout(() => {
				if (!this.connected) {
					client.end(true);
					this.connectionPromise = null;
					reject(new Error(`MQTT connection timeout after 10s: ${brokerUrl}`));
				}
			}, 10000);

			client.on('connect', () => {
				clearTimeout(connectionTimeout);
				this.connected = true;
				this.reconnectAttempts = 0;
				this.connectionPromise = null;

				this.logger.info('Connected to MQTT broker', {
					component: LogComponents.MQTT,
					brokerUrl,
				});

				this.resubscribe(client);
				this.drainPendingPublishes(client);
				this.emit('connect');
				resolve();
			});

			client.on('error', (err) => {
				this.logger.error('MQTT connection error', {
					component: LogComponents.MQTT,
					brokerUrl,
					connected: this.connected,
					...errorMeta(err),
				});

				if (!this.connected) {
					clearTimeout(connectionTimeout);
					this.connectionPromise = null;
					reject(err);
				}
			});

			client.on('offline', () => {
				this.connected = false;
				this.logger.warn('MQTT client offline', {
					component: LogComponents.MQTT,
					pendingPublishes: this.pendingPublishes.length,
				});
			});

			client.on('close', () => {
				this.connected = false;
				if (this.stopping) {
					return;
				}
				this.logger.warn('MQTT connection closed', {
					component: LogComponents.MQTT,
					pendingPublishes: this.pendingPublishes.length,
					reconnectAttempts: this.reconnectAttempts,
				});

				this.scheduleReconnect(brokerUrl, options);
			});

			// Set up global message handler
			client.on('message', (topic: string, payload: Buffer) => {
				this.routeMessage(topic, payload);
			});
		});

		return this.connectionPromise;
	}

	/**
	 * Publish message to MQTT topic
	 *
	 * If offline, queues message for delivery on reconnect.
	 */
	public async publish(topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void> {
		if (!this.client || !this.connected) {
			if (this.pendingPublishes.length >= this.MAX_PENDING_PUBLISHES) {
				this.logger.warn(`Pending publish queue full (${this.MAX_PENDING_PUBLISHES}), dropping oldest message`, {
					component: LogComponents.MQTT,
				});
				this.pendingPublishes.shift();
			}

			this.pendingPublishes.push({ topic, payload, options });
			return;
		}

		return this.send(this.client, topic, payload, options);
	}

	/**
	 * Publish message to MQTT topic WITHOUT queueing
	 *
	 * Throws immediately if not connected, so callers can retry or report.
	 */
	public async publishNoQueue(topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void> {
		if (!this.client || !this.connected) {
			throw new Error(`MQTT not connected - cannot publish to ${topic}`);
		}

		return this.send(this.client, topic, payload, options);
	}

	/**
	 * Subscribe to MQTT topic with a handler. The subscription is restored
	 * after every reconnect.
	 */
	public async subscribe(topic: string, options: IClientSubscribeOptions, handler: MessageHandler): Promise<void> {
		const client = this.client;
		if (!client || !this.connected) {
			throw new Error(`MQTT client not connected - cannot subscribe to ${topic}`);
		}

		await new Promise<void>((resolve, reject) => {
			client.subscribe(topic, options, (error, granted) => {
				if (error) {
					reject(new Error(`Subscribe error: ${error.message || 'Unspecified error'}`));
				} else if (!granted || granted.length === 0) {
					reject(new Error(`Subscribe failed: No subscription granted for topic: ${topic}`));
				} else if (granted[0].qos === 128) {
					// QoS 128 means subscription failed (rejected by broker)
					reject(new Error(`Subscribe rejected by broker (QoS=128) for topic: ${topic}`));
				} else {
					resolve();
				}
			});
		});

		this.subscriptionHandlers.push({ pattern: topic, handler });
		this.logger.info('Subscribed to topic', {
			component: LogComponents.MQTT,
			topic,
			qos: options.qos,
		});
	}

	/**
	 * Check if connected
	 */
	public isConnected(): boolean {
		return this.connected && this.client !== null;
	}

	public getPendingCount(): number {
		return this.pendingPublishes.length;
	}

	/**
	 * Disconnect from MQTT broker without reconnecting
	 */
	public async disconnect(): Promise<void> {
		this.stopping = true;
		clearTimeout(this.reconnectTimer);

		const client = this.client;
		if (!client) return;

		await new Promise<void>((resolve) => {
			client.end(false, {}, () => resolve());
		});
		this.connected = false;
		this.client = null;
		this.subscriptionHandlers = [];

		this.logger.info('Disconnected from MQTT broker', {
			component: LogComponents.MQTT,
			droppedPublishes: this.pendingPublishes.length,
		});
	}

	private send(client: MqttClient, topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void> {
		return new Promise((resolve, reject) => {
			const timeout = setTimeout(() => {
				reject(new Error(`MQTT publish timeout after ${this.PUBLISH_TIMEOUT_MS / 1000}s: ${topic}`));
			}, this.PUBLISH_TIMEOUT_MS);

			client.publish(topic, payload, options || {}, (error) => {
				clearTimeout(timeout);
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Route incoming messages to registered handlers
	 * Supports overlapping patterns (e.g., foo/# and foo/bar)
	 */
	private routeMessage(topic: string, payload: Buffer): void {
		for (const subscription of this.subscriptionHandlers) {
			if (topicMatches(subscription.pattern, topic)) {
				try {
					subscription.handler(topic, payload);
				} catch (error) {
					this.logger.error(`Error in MQTT handler for pattern ${subscription.pattern}`, {
						component: LogComponents.MQTT,
						topic,
						...errorMeta(error),
					});
				}
			}
		}
	}

	private resubscribe(client: MqttClient): void {
		const patterns = new Set(this.subscriptionHandlers.map(s => s.pattern));
		for (const pattern of patterns) {
			client.subscribe(pattern, { qos: 1 }, (error) => {
				if (error) {
					this.logger.error('Resubscribe failed', {
						component: LogComponents.MQTT,
						topic: pattern,
						...errorMeta(error),
					});
				}
			});
		}
	}

	/**
	 * Schedule reconnect with exponential backoff
	 */
	private scheduleReconnect(brokerUrl: string, options?: IClientOptions): void {
		this.reconnectAttempts++;
		const delay = Math.min(
			this.MAX_RECONNECT_DELAY_MS,
			this.BASE_RECONNECT_DELAY_MS * Math.pow(2, this.reconnectAttempts - 1)
		);

		this.logger.info(`Scheduling MQTT reconnect attempt ${this.reconnectAttempts} in ${delay}ms`, {
			component: LogComponents.MQTT,
		});

		clearTimeout(this.reconnectTimer);
		this.reconnectTimer = setTimeout(() => {
			if (!this.connected && !this.connectionPromise && !this.stopping) {
				this.connect(brokerUrl, options).catch((error) => {
					this.logger.error(`Reconnect attempt ${this.reconnectAttempts} failed`, {
						component: LogComponents.MQTT,
						...errorMeta(error),
					});
				});
			}
		}, delay);
	}

	/**
	 * Drain pending publishes on reconnect
	 */
	private drainPendingPublishes(client: MqttClient): void {
		if (this.pendingPublishes.length === 0) {
			return;
		}

		this.logger.info(`Draining ${this.pendingPublishes.length} pending MQTT messages`, {
			component: LogComponents.MQTT,
		});

		const messages = [...this.pendingPublishes];
		this.pendingPublishes = [];

		for (const msg of messages) {
			client.publish(msg.topic, msg.payload, msg.options || {}, (error) => {
				if (error) {
					this.logger.error(`Failed to drain message to ${msg.topic}`, {
						component: LogComponents.MQTT,
						...errorMeta(error),
					});
					// Re-queue failed message
					this.pendingPublishes.push(msg);
				}
			});
		}
	}
}
