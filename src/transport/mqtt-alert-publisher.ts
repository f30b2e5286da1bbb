/**
 * Alert publisher over MQTT
 */

import type { IClientPublishOptions } from 'mqtt';
import { TransportError } from '../inference/errors';
import type { AlertPublisher, AlertRecord } from '../inference/types';

/**
 * The part of MqttManager the publisher needs
 */
export interface MqttPublishClient {
	publish(topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void>;
	publishNoQueue(topic: string, payload: string | Buffer, options?: IClientPublishOptions): Promise<void>;
}

export interface MqttAlertPublisherOptions {
	topic: string;
	/** Queue alerts while disconnected instead of failing the attempt */
	queueWhenOffline?: boolean;
}

export class MqttAlertPublisher implements AlertPublisher {
	private readonly mqtt: MqttPublishClient;
	private readonly options: MqttAlertPublisherOptions;

	constructor(mqtt: MqttPublishClient, options: MqttAlertPublisherOptions) {
		this.mqtt = mqtt;
		this.options = options;
	}

	async publish(record: AlertRecord): Promise<void> {
		const payload = JSON.stringify(record);
		const options: IClientPublishOptions = { qos: 1 };

		try {
			if (this.options.queueWhenOffline) {
				await this.mqtt.publish(this.options.topic, payload, options);
			} else {
				await this.mqtt.publishNoQueue(this.options.topic, payload, options);
			}
		} catch (error) {
			throw new TransportError(
				`Failed to publish alert to ${this.options.topic}: ${error instanceof Error ? error.message : String(error)}`,
				record.monitorId,
				{ cause: error }
			);
		}
	}
}
