import { type RelayConfig, loadConfig } from "@relay/core-config";
import { type DynamicModule, Global, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { type LoggingConfig, loggingConfigFor } from "../telemetry/log-tier.js";

/**
 * Validated relay configuration plus the log shipping rules derived from it
 */
export interface WorkerConfig extends RelayConfig {
	logging: LoggingConfig;
}

export const WORKER_CONFIG = "WORKER_CONFIG";

export interface WorkerConfigOptions {
	envFilePath?: string;
	/** Throw on the first missing required variable */
	strict?: boolean;
}

export function buildWorkerConfig(
	env: Record<string, string | undefined> = process.env,
	strict = false,
): WorkerConfig {
	const config = loadConfig({ env, strict });
	return {
		...config,
		logging: loggingConfigFor(config.base.env, config.base.logLevel),
	};
}

@Global()
@Module({})
export class WorkerConfigModule {
	static forRoot(options: WorkerConfigOptions = {}): DynamicModule {
		return {
			module: WorkerConfigModule,
			imports: [
				// Loads the env file into process.env before the factory below reads it
				ConfigModule.forRoot({
					...(options.envFilePath && { envFilePath: options.envFilePath }),
					isGlobal: true,
				}),
			],
			providers: [
				{
					provide: WORKER_CONFIG,
					useFactory: () => buildWorkerConfig(process.env, options.strict),
				},
			],
			exports: [WORKER_CONFIG],
		};
	}
}
