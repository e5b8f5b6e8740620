import type { KafkaConfig } from "@relay/core-config";
import type { Logger } from "@relay/core-telemetry";
import { Kafka, type KafkaConfig as KafkaJSConfig, logLevel } from "kafkajs";

export interface KafkaClientOptions {
	config: KafkaConfig;
	logger: Logger;
}

export function createKafkaClient(options: KafkaClientOptions): Kafka {
	const { config, logger } = options;

	const kafkaConfig: KafkaJSConfig = {
		clientId: config.clientId,
		brokers: config.brokers,
		ssl: config.ssl,
		logLevel: logLevel.INFO,
		logCreator: () => {
			return ({ namespace, log }) => {
				const { message, ...extra } = log;
				logger.debug(message, { namespace, ...extra });
			};
		},
		retry: {
			retries: config.maxRetries,
			initialRetryTime: config.retryBackoffMs,
			maxRetryTime: 30000,
		},
	};

	if (config.sasl) {
		const { mechanism, username, password } = config.sasl;
		if (mechanism === "plain") {
			kafkaConfig.sasl = { mechanism: "plain", username, password };
		} else if (mechanism === "scram-sha-256") {
			kafkaConfig.sasl = { mechanism: "scram-sha-256", username, password };
		} else {
			kafkaConfig.sasl = { mechanism: "scram-sha-512", username, password };
		}
	}

	return new Kafka(kafkaConfig);
}
