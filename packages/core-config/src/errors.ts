export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class MissingEnvVarError extends ConfigError {
	constructor(
		public readonly variableName: string,
		public readonly description?: string,
	) {
		super(
			`Missing required environment variable: ${variableName}${
				description ? ` (${description})` : ""
			}`,
		);
		this.name = "MissingEnvVarError";
	}
}

export class ValidationError extends ConfigError {
	constructor(
		section: string,
		public readonly errors: Array<{ path: string; message: string }>,
	) {
		super(
			`Invalid ${section} configuration: ${errors
				.map((e) => `${e.path || "(root)"}: ${e.message}`)
				.join("; ")}`,
		);
		this.name = "ValidationError";
	}
}
